export * from "./downloadStats";
export * from "./progressReporter";
export * from "./report";
