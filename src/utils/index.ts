export * from "./abort";
export * from "./cookies";
export * from "./csv";
export * from "./debug";
export * from "./headers";
export * from "./http";
