export * from "./enums";
export * from "./errors";
export * from "./hosts";
export * from "./endpoints";
