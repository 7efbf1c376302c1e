// Repository liveness check (network)
export * from "./client";
// Constants
export * from "./constants";
// Error types
export * from "./errors";
// Registry model, validator, diff and gate
export * from "./registry";
// Entry field schemas
export * from "./schemas";
// Utilities
export * from "./utils";
