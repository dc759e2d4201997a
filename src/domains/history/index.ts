export * from "./history";
export * from "./history.types";
