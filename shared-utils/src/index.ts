// Re-export everything from bus module
export * from "./bus";

// Re-export all shared utilities
export * from "./config";
export * from "./lock";
export * from "./logger";

