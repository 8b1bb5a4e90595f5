export * from "./server/logger";
export * from "./types";
export * from "./util";
