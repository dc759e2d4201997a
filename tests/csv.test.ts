import { describe, it, expect } from "vitest";
import { PassThrough, Readable } from "stream";
import { ERROR, TICK_VARIANT } from "@/constants";
import { decodeTicks, parseDecimal, parseInteger } from "@/utils";
import { collect, HISTORY_CSV } from "./helpers";

describe("parseDecimal", () => {
  it("should parse plain decimals", () => {
    expect(parseDecimal("115.800003")).toBe(115.800003);
    expect(parseDecimal("-0.5")).toBe(-0.5);
  });

  it("should reject placeholders and garbage", () => {
    expect(parseDecimal("null")).toBeNull();
    expect(parseDecimal("")).toBeNull();
    expect(parseDecimal("1.2.3")).toBeNull();
    expect(parseDecimal("Infinity")).toBeNull();
  });
});

describe("parseInteger", () => {
  it("should accept whole numbers only", () => {
    expect(parseInteger("28781900")).toBe(28781900);
    expect(parseInteger("12.5")).toBeNull();
    expect(parseInteger("null")).toBeNull();
  });
});

describe("decodeTicks", () => {
  it("should decode history rows in stream order", async () => {
    const ticks = await collect(decodeTicks(Readable.from([HISTORY_CSV]), TICK_VARIANT.HISTORY));

    expect(ticks.map((t) => t.date)).toEqual(["2017-10-10", "2017-10-11", "2017-10-12"]);
    expect(ticks[0]).toEqual({
      date: "2017-10-10",
      open: 74.800003,
      high: 75.419998,
      low: 74.449997,
      close: 75.18,
      adjustedClose: 68.957863,
      volume: 16128500,
    });
  });

  it("should produce nothing for a header-only body", async () => {
    const ticks = await collect(
      decodeTicks(Readable.from(["Date,Open,High,Low,Close,Adj Close,Volume\n"]), TICK_VARIANT.HISTORY),
    );
    expect(ticks).toEqual([]);
  });

  it("should produce nothing for an empty body", async () => {
    expect(await collect(decodeTicks(Readable.from([""]), TICK_VARIANT.DIVIDEND))).toEqual([]);
  });

  it("should drop a row holding null without touching the others", async () => {
    const csv =
      "Date,Open,High,Low,Close,Adj Close,Volume\n" +
      "2017-10-10,74.8,75.4,74.4,75.18,68.95,16128500\n" +
      "2017-10-11,null,null,null,null,null,null\n" +
      "2017-10-12,73.66,73.84,71.99,72.37,66.38,30592300\n";

    const ticks = await collect(decodeTicks(Readable.from([csv]), TICK_VARIANT.HISTORY));
    expect(ticks.map((t) => t.date)).toEqual(["2017-10-10", "2017-10-12"]);
  });

  it("should drop rows with a partial null, a wrong field count or a bad date", async () => {
    const csv =
      "Date,Open,High,Low,Close,Adj Close,Volume\n" +
      "2017-10-10,74.8,75.4,null,75.18,68.95,16128500\n" +
      "2017-10-11,74.8,75.4,74.4,75.18,68.95\n" +
      "10/12/2017,74.8,75.4,74.4,75.18,68.95,100\n" +
      "2017-10-13,74.8,75.4,74.4,75.18,68.95,1.5\n" +
      "2017-10-16,74.8,75.4,74.4,75.18,68.95,100\n";

    const ticks = await collect(decodeTicks(Readable.from([csv]), TICK_VARIANT.HISTORY));
    expect(ticks.map((t) => t.date)).toEqual(["2017-10-16"]);
  });

  it("should read quoted fields", async () => {
    const csv = 'Date,Dividends\n"2016-02-04","0.52"\n';
    const ticks = await collect(decodeTicks(Readable.from([csv]), TICK_VARIANT.DIVIDEND));
    expect(ticks).toEqual([{ date: "2016-02-04", dividend: 0.52 }]);
  });

  it("should reassemble rows split across chunks", async () => {
    const ticks = await collect(
      decodeTicks(Readable.from(["Date,Divid", "ends\n2016-0", "2-04,0.52\n2016-05-12,0.57\n"]), TICK_VARIANT.DIVIDEND),
    );
    expect(ticks).toEqual([
      { date: "2016-02-04", dividend: 0.52 },
      { date: "2016-05-12", dividend: 0.57 },
    ]);
  });

  it("should decode split ratios as before/after", async () => {
    const csv = "Date,Stock Splits\n2014-06-09,7/1\n2020-08-31,4:1\n2021-01-04,1/2/3\n2022-06-06,1/x\n2023-01-03,1/20\n";
    const ticks = await collect(decodeTicks(Readable.from([csv]), TICK_VARIANT.SPLIT));
    expect(ticks).toEqual([
      { date: "2014-06-09", beforeSplit: 7, afterSplit: 1 },
      { date: "2023-01-03", beforeSplit: 1, afterSplit: 20 },
    ]);
  });

  it("should yield a record before the stream ends", async () => {
    const source = new PassThrough();
    const ticks = decodeTicks(source, TICK_VARIANT.DIVIDEND);

    source.write("Date,Dividends\n2016-02-04,0.52\n2016-05");
    const first = await ticks.next();
    expect(first).toEqual({ done: false, value: { date: "2016-02-04", dividend: 0.52 } });

    source.end("-12,0.57\n");
    expect(await collect(ticks)).toEqual([{ date: "2016-05-12", dividend: 0.57 }]);
  });

  it("should stop with the source's error", async () => {
    const source = new PassThrough();
    const pending = collect(decodeTicks(source, TICK_VARIANT.DIVIDEND));

    source.write("Date,Dividends\n");
    source.destroy(new Error("socket hang up"));

    await expect(pending).rejects.toThrow("socket hang up");
  });

  it("should stop with CANCELLED once the signal aborts", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      collect(decodeTicks(Readable.from([HISTORY_CSV]), TICK_VARIANT.HISTORY, controller.signal)),
    ).rejects.toMatchObject({ code: ERROR.CANCELLED });
  });
});
