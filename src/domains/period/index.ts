export * from "./period";
export * from "./period.types";
