import { describe, it, expect } from "vitest";
import { Cookies } from "@/utils";

describe("Cookies.parse", () => {
  it("should read name and value, ignoring attributes", () => {
    const jar = Cookies.parse(["A3=d=AQABBK&S=AQAAA; Expires=Fri, 01 Jan 2099 00:00:00 GMT; Path=/; Domain=.yahoo.com"]);
    expect(jar).toEqual({ A3: "d=AQABBK&S=AQAAA" });
  });

  it("should mark deleted cookies as null", () => {
    const jar = Cookies.parse([
      "B=; Path=/",
      "C=gone; Max-Age=0",
      "D=old; Expires=Thu, 01 Jan 1970 00:00:00 GMT",
    ]);
    expect(jar).toEqual({ B: null, C: null, D: null });
  });

  it("should skip malformed entries", () => {
    expect(Cookies.parse(["novalue", "=nameless"])).toEqual({});
  });
});

describe("Cookies.merge", () => {
  it("should overwrite, add and delete", () => {
    const merged = Cookies.merge({ A3: "old", B: "x" }, { A3: "new", B: null, C: "c" });
    expect(merged).toEqual({ A3: "new", C: "c" });
  });
});

describe("Cookies.serialize", () => {
  it("should join pairs for the Cookie header", () => {
    expect(Cookies.serialize({ A3: "d=1", C: "c" })).toBe("A3=d=1; C=c");
  });
});
