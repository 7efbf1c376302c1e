export * from "./diff";
export * from "./json";
