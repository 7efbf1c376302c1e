export * from "./diff";
export * from "./entry";
export * from "./format";
export * from "./gate";
export * from "./name";
export * from "./types";
export * from "./validate";
