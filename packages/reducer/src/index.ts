export * from "./config";
export * from "./errors";
export * from "./lexicon";
export * from "./mode";
export * from "./output";
export * from "./reduce";
export * from "./registry/memory";
export * from "./registry/postgres";
export * from "./registry/registry";
export * from "./registry/store";
export * from "./stages/01_normalize";
export * from "./stages/02_score";
export * from "./stages/03_graph";
export * from "./stages/04_cluster";
export * from "./stages/05_assign";
export * from "./types";
export * from "./witness";
