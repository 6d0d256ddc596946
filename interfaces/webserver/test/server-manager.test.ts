import {
  describe,
  it,
  expect,
  beforeAll,
  afterAll,
  afterEach,
  vi,
} from "vitest";
import { Server } from "http";
import { connect } from "net";
import { join } from "path";
import type { Logger } from "@coi-serve/utils";
import {
  createMockLogger,
  createSilentLogger,
  createTempSite,
  type TempSite,
} from "@coi-serve/test-utils";
import { ServerManager } from "../src/server-manager";
import { ServerStartError } from "../src/errors";
import { HeaderSet } from "../src/header-set";

const HOST = "127.0.0.1";

describe("ServerManager", () => {
  let site: TempSite;
  const managers: ServerManager[] = [];

  const createManager = (
    overrides: { rootDir?: string; port?: number; logger?: Logger } = {},
  ): ServerManager => {
    const manager = new ServerManager({
      logger: overrides.logger ?? createSilentLogger("server-test"),
      headers: HeaderSet.crossOriginIsolation(),
      rootDir: overrides.rootDir ?? site.root,
      port: overrides.port ?? 0,
      hostname: HOST,
    });
    managers.push(manager);
    return manager;
  };

  const portOf = (url: string): string => new URL(url).port;

  interface RawResponse {
    statusLine: string;
    headers: Map<string, string>;
  }

  // Writes the request bytes as given and reads until the server closes
  const sendRaw = (url: string, request: string): Promise<RawResponse> =>
    new Promise((resolveResponse, rejectResponse) => {
      let received = "";
      const socket = connect(Number(portOf(url)), HOST, () => {
        socket.write(request);
      });
      socket.setEncoding("utf8");
      socket.on("data", (chunk: string) => {
        received += chunk;
      });
      socket.on("error", rejectResponse);
      socket.on("end", () => {
        const [head = ""] = received.split("\r\n\r\n");
        const [statusLine = "", ...lines] = head.split("\r\n");
        const headers = new Map<string, string>();
        for (const line of lines) {
          const colon = line.indexOf(":");
          headers.set(
            line.slice(0, colon).toLowerCase(),
            line.slice(colon + 1).trim(),
          );
        }
        resolveResponse({ statusLine, headers });
      });
    });

  beforeAll(async () => {
    site = await createTempSite({
      "index.html": "<!doctype html><title>demo</title>",
    });
  });

  afterEach(async () => {
    for (const manager of managers.splice(0)) {
      if (manager.getStatus().running) {
        await manager.stop();
      }
    }
  });

  afterAll(async () => {
    await site.cleanup();
  });

  it("should serve requests over a real socket with the header set", async () => {
    const manager = createManager();
    const url = await manager.start();
    const base = `http://${HOST}:${portOf(url)}`;

    const preflight = await fetch(`${base}/anything`, { method: "OPTIONS" });
    expect(preflight.status).toBe(200);
    expect(await preflight.text()).toBe("");
    expect(preflight.headers.get("Access-Control-Allow-Methods")).toBe(
      "GET, POST, OPTIONS",
    );

    const page = await fetch(`${base}/index.html`);
    expect(page.status).toBe(200);
    expect(await page.text()).toBe("<!doctype html><title>demo</title>");
    expect(page.headers.get("Cross-Origin-Embedder-Policy")).toBe(
      "require-corp",
    );

    const missing = await fetch(`${base}/missing.html`);
    expect(missing.status).toBe(404);
    expect(await missing.text()).toBe("Not Found");
    expect(missing.headers.get("Cross-Origin-Opener-Policy")).toBe(
      "same-origin",
    );
  });

  it("should answer an asterisk-form OPTIONS request with the header set", async () => {
    const url = await createManager().start();

    const response = await sendRaw(
      url,
      "OPTIONS * HTTP/1.1\r\nHost: localhost\r\nConnection: close\r\n\r\n",
    );

    expect(response.statusLine).toBe("HTTP/1.1 200 OK");
    expect(response.headers.get("access-control-allow-methods")).toBe(
      "GET, POST, OPTIONS",
    );
    expect(response.headers.get("cross-origin-opener-policy")).toBe(
      "same-origin",
    );
  });

  it("should serve an HTTP/1.0 request without a Host header", async () => {
    const url = await createManager().start();

    const response = await sendRaw(url, "GET /index.html HTTP/1.0\r\n\r\n");

    expect(response.statusLine).toBe("HTTP/1.1 200 OK");
    expect(response.headers.get("cross-origin-embedder-policy")).toBe(
      "require-corp",
    );
    expect(response.headers.get("cache-control")).toBe(
      "no-store, no-cache, must-revalidate",
    );
  });

  it("should reject a malformed Host header with the header set", async () => {
    const logger = createMockLogger();
    const url = await createManager({ logger }).start();

    const response = await sendRaw(
      url,
      "GET / HTTP/1.1\r\nHost: bad host\r\nConnection: close\r\n\r\n",
    );

    expect(response.statusLine).toBe("HTTP/1.1 400 Bad Request");
    expect(response.headers.get("cross-origin-opener-policy")).toBe(
      "same-origin",
    );
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining("Answered 400 outside the gateway"),
    );
  });

  it("should log listener errors raised after startup", async () => {
    const listen = vi.spyOn(Server.prototype, "listen");
    const logger = createMockLogger();
    await createManager({ logger }).start();

    const server = listen.mock.contexts[0];
    listen.mockRestore();
    if (!(server instanceof Server)) {
      throw new Error("Expected the manager to listen on an http.Server");
    }

    expect(server.listenerCount("error")).toBe(1);
    server.emit("error", new Error("accept failed"));

    expect(logger.error).toHaveBeenCalledWith("Server error: accept failed");
  });

  it("should report the bound URL in its status", async () => {
    const manager = createManager();

    expect(manager.getStatus()).toEqual({ running: false, url: undefined });

    const url = await manager.start();

    expect(url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(portOf(url)).not.toBe("0");
    expect(manager.getStatus()).toEqual({ running: true, url });
  });

  it("should return the running URL when started twice", async () => {
    const logger = createMockLogger();
    const manager = createManager({ logger });

    const first = await manager.start();
    const second = await manager.start();

    expect(second).toBe(first);
    expect(logger.warn).toHaveBeenCalledWith("Server already running");
  });

  it("should release the port on stop", async () => {
    const manager = createManager();
    const url = await manager.start();

    await manager.stop();

    expect(manager.getStatus()).toEqual({ running: false, url: undefined });
    await expect(fetch(`http://${HOST}:${portOf(url)}/`)).rejects.toThrow();
  });

  it("should warn when stopping a server that is not running", async () => {
    const logger = createMockLogger();
    const manager = createManager({ logger });

    await manager.stop();

    expect(logger.warn).toHaveBeenCalledWith("Server not running");
  });

  it("should fail to start when the port is taken", async () => {
    const first = createManager();
    const url = await first.start();

    const port = Number(portOf(url));
    const second = createManager({ port });

    const attempt = second.start();
    await expect(attempt).rejects.toBeInstanceOf(ServerStartError);
    await expect(attempt).rejects.toThrow(
      `Could not listen on ${HOST}:${port}: port already in use`,
    );
    expect(second.getStatus().running).toBe(false);
  });

  it("should fail to start when the root directory is missing", async () => {
    const manager = createManager({
      rootDir: join(site.root, "does-not-exist"),
    });

    await expect(manager.start()).rejects.toThrow(
      `Root directory not found: ${join(site.root, "does-not-exist")}`,
    );
  });
});
