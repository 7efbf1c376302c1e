export * from "./github";
