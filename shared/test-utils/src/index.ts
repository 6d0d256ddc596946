/**
 * @coi-serve/test-utils
 *
 * Helpers shared by the workspace's tests.
 */

// Logger utilities
export { createSilentLogger, createMockLogger } from "./mock-logger";

// Filesystem fixtures
export { createTempSite, type TempSite } from "./fixtures";
