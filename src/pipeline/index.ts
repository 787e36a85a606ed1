export * from "./coordinator";
export * from "./workQueue";
