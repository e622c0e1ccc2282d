export * from "./date-range.schema";
export * from "./config.schema";
