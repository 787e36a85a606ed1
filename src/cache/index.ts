export * from "./dedupCache";
