/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/fetchRunsRepo";
export * from "./repos/vacanciesRepo";
