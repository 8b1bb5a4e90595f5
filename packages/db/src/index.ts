export * from "./client";
export * from "./config";
export * from "./constants";
export * from "./queries/semantic_constant";
export * from "./tables";
