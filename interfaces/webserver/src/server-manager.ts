import { getRequestListener, RequestError } from "@hono/node-server";
import type { Hono } from "hono";
import {
  getErrorCode,
  getErrorMessage,
  type Logger,
} from "@coi-serve/utils";
import { existsSync } from "fs";
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "http";
import { resolve } from "path";
import { createHeaderInjectingGateway } from "./gateway";
import { createStaticResponder } from "./static-responder";
import { ServerStartError } from "./errors";
import type { HeaderSet } from "./header-set";

export interface ServerManagerOptions {
  logger: Logger;
  headers: HeaderSet;
  rootDir: string;
  port: number;
  hostname: string;
}

export interface ServerStatus {
  running: boolean;
  url: string | undefined;
}

const WILDCARD_HOSTS = new Set(["0.0.0.0", "::"]);

function displayHost(hostname: string): string {
  if (WILDCARD_HOSTS.has(hostname)) return "localhost";
  return hostname.includes(":") ? `[${hostname}]` : hostname;
}

/**
 * Owns the HTTP listener. One gateway instance serves every connection.
 */
export class ServerManager {
  public readonly rootDir: string;
  private logger: Logger;
  private options: ServerManagerOptions;
  private server: Server | null = null;
  private url: string | undefined;

  constructor(options: ServerManagerOptions) {
    this.logger = options.logger;
    this.options = options;
    // Resolve relative to process.cwd()
    this.rootDir = resolve(process.cwd(), options.rootDir);
  }

  /**
   * Build the gateway over a static responder for the root directory
   */
  public createApp(): Hono {
    const responder = createStaticResponder({
      rootDir: this.rootDir,
      logger: this.logger.child("StaticResponder"),
    });

    return createHeaderInjectingGateway({
      headers: this.options.headers,
      responder,
      logger: this.logger.child("Gateway"),
    });
  }

  /**
   * Node request listener in front of the gateway. Requests the adapter
   * cannot turn into a `Request` are answered here, with the header set.
   */
  public createRequestListener(
    app: Hono,
  ): (incoming: IncomingMessage, outgoing: ServerResponse) => void {
    const { headers, hostname } = this.options;
    const listener = getRequestListener(app.fetch, {
      // HTTP/1.0 clients may omit Host
      hostname: displayHost(hostname),
      errorHandler: (error) => {
        const badRequest = error instanceof RequestError;
        const status = badRequest ? 400 : 500;
        const body = badRequest ? "Bad Request" : "Internal Server Error";
        this.logger.warn(
          `Answered ${status} outside the gateway: ${getErrorMessage(error)}`,
        );
        return new Response(body, {
          status,
          headers: {
            "Content-Type": "text/plain; charset=UTF-8",
            ...headers.toRecord(),
          },
        });
      },
    });

    return (incoming, outgoing) => {
      // Asterisk-form target (`OPTIONS * HTTP/1.1`) addresses the server itself
      if (incoming.method === "OPTIONS" && incoming.url === "*") {
        incoming.url = "/";
      }
      listener(incoming, outgoing).catch((error: unknown) => {
        this.logger.error(`Request listener failed: ${getErrorMessage(error)}`);
      });
    };
  }

  /**
   * Start listening. Resolves with the local URL once the port is bound.
   */
  async start(): Promise<string> {
    if (this.server && this.url) {
      this.logger.warn("Server already running");
      return this.url;
    }

    if (!existsSync(this.rootDir)) {
      throw new ServerStartError(`Root directory not found: ${this.rootDir}`);
    }

    const { hostname, port } = this.options;
    this.logger.info(`Starting server on ${hostname}:${port}`);

    const server = createServer(this.createRequestListener(this.createApp()));
    const boundPort = await new Promise<number>(
      (resolveListening, rejectListening) => {
        const onStartError = (error: Error): void => {
          const reason =
            getErrorCode(error) === "EADDRINUSE"
              ? "port already in use"
              : getErrorMessage(error);
          rejectListening(
            new ServerStartError(
              `Could not listen on ${hostname}:${port}: ${reason}`,
              { cause: error },
            ),
          );
        };
        server.once("error", onStartError);
        server.listen(port, hostname, () => {
          server.off("error", onStartError);
          const address = server.address();
          resolveListening(
            typeof address === "object" && address !== null
              ? address.port
              : port,
          );
        });
      },
    );

    server.on("error", (error) => {
      this.logger.error(`Server error: ${getErrorMessage(error)}`);
    });
    this.server = server;
    this.url = `http://${displayHost(hostname)}:${boundPort}`;
    this.logger.info(`Server started at ${this.url}`);
    return this.url;
  }

  /**
   * Stop accepting connections and release the port
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.logger.warn("Server not running");
      return;
    }

    this.server = null;
    this.url = undefined;

    await new Promise<void>((resolveClosed, rejectClosed) => {
      server.close((error) => {
        if (error) {
          rejectClosed(error);
        } else {
          resolveClosed();
        }
      });
      // Requests are single bounded file reads; nothing to drain
      server.closeAllConnections();
    });

    this.logger.info("Server stopped");
  }

  getStatus(): ServerStatus {
    return {
      running: this.server !== null,
      url: this.url,
    };
  }
}
