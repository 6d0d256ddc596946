/**
 * The listener could not be brought up: missing root directory, port in use,
 * permission denied.
 */
export class ServerStartError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ServerStartError";
  }
}
