import { vi } from "vitest";
import { createSilentLogger, type Logger } from "@coi-serve/utils";

export { createSilentLogger } from "@coi-serve/utils";

/**
 * Create a silent Logger whose methods are spied on, for asserting log calls
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * await gateway.fetch(new Request("http://localhost/"));
 * expect(logger.info).toHaveBeenCalledWith('"GET /" 200');
 * ```
 */
export function createMockLogger(context?: string): Logger {
  const logger = createSilentLogger(context);
  vi.spyOn(logger, "debug");
  vi.spyOn(logger, "info");
  vi.spyOn(logger, "warn");
  vi.spyOn(logger, "error");
  return logger;
}
