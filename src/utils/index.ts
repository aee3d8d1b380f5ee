/**
 * Shared utilities
 */

// Re-export logger module
export * from "./logger.js";

// Re-export validation schemas and config loading
export * from "./validation.js";
