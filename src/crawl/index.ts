export * from "./browser";
export * from "./discovery";
export * from "./htmlParser";
