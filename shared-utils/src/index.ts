// Re-export everything from bus module
export * from "./bus";

// Re-export all shared utilities
export * from "./adapters";
export * from "./config";
export * from "./logger";

// Version info
export const VERSION = "1.0.0";
