export * from "./session";
export * from "./session.types";
