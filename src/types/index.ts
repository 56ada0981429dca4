export * from "./logger";
export * from "./db";
export * from "./fetch";
export * from "./output";
export * from "./clients/http";
export * from "./clients/hh";
