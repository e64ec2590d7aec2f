export * from "./types";
export * from "./route";
export * from "./schema";
