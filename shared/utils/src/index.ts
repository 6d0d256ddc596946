/**
 * Shared utilities for the coi-serve workspace.
 */

// Logger
export { Logger, LogLevel, type LoggerOptions } from "./logger";

// Test utilities
export { createSilentLogger } from "./test-utils";

// Error utilities
export { getErrorMessage, getErrorCode } from "./error";

// Zod
export { z, ZodError } from "./zod";
