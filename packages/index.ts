export * from "./anchors";
export * from "./core";
export * from "./actions/src";
