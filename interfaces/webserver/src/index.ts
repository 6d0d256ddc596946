/**
 * @coi-serve/webserver - static file serving with cross-origin isolation
 *
 * A gateway app wraps a static responder and writes a fixed header set onto
 * every response, including errors and CORS preflights.
 */

export {
  HeaderSet,
  CROSS_ORIGIN_ISOLATION_HEADERS,
  headerEntriesSchema,
  type HeaderEntry,
} from "./header-set";
export {
  createHeaderInjectingGateway,
  type HeaderInjectingGatewayOptions,
} from "./gateway";
export {
  createStaticResponder,
  resolveRequestPath,
  type StaticResponder,
  type StaticResponderOptions,
} from "./static-responder";
export {
  webserverConfigSchema,
  defaultWebserverConfig,
  DEFAULT_BANNER,
  type WebserverConfig,
  type WebserverConfigInput,
} from "./config";
export { ServerStartError } from "./errors";
export { ServerManager } from "./server-manager";
export type { ServerManagerOptions, ServerStatus } from "./server-manager";
