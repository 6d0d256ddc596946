import { Hono } from "hono";
import { serveStatic } from "@hono/node-server/serve-static";
import { existsSync, statSync } from "fs";
import { readFile } from "fs/promises";
import { join, resolve } from "path";
import type { Logger } from "@coi-serve/utils";

/**
 * Anything that can turn a request into a response. The gateway wraps one of
 * these and never looks inside it.
 */
export interface StaticResponder {
  fetch(request: Request): Response | Promise<Response>;
}

export interface StaticResponderOptions {
  rootDir: string;
  logger: Logger;
}

const SERVED_METHODS = new Set(["GET", "HEAD"]);

/**
 * Map a raw URL path onto the filesystem under `root`.
 * Returns undefined for undecodable paths and paths with a `..` segment.
 */
export function resolveRequestPath(
  root: string,
  requestPath: string,
): string | undefined {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return undefined;
  }
  if (/(?:^|[/\\])\.\.(?:$|[/\\])/.test(decoded)) {
    return undefined;
  }
  return join(root, decoded);
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Create the static file app serving `rootDir`
 *
 * GET and HEAD serve files (a directory serves its index.html); every other
 * method is answered with 501.
 */
export function createStaticResponder(options: StaticResponderOptions): Hono {
  const root = resolve(process.cwd(), options.rootDir);
  const logger = options.logger;
  const app = new Hono();

  app.use("*", async (c, next) => {
    const method = c.req.method;
    if (!SERVED_METHODS.has(method)) {
      return c.text(`Unsupported method ('${method}')`, 501);
    }
    await next();
  });

  // Directories need a trailing slash so relative links inside index.html resolve
  app.use("*", async (c, next) => {
    // c.req.path is already decoded; Location must stay percent-encoded
    const { pathname, search } = new URL(c.req.url);
    if (!pathname.endsWith("/")) {
      const target = resolveRequestPath(root, pathname);
      if (target && isDirectory(target)) {
        return c.redirect(`${pathname}/${search}`, 301);
      }
    }
    await next();
  });

  app.get(
    "*",
    serveStatic({
      root,
      onNotFound: (path) => {
        logger.debug(`No file for ${path}`);
      },
    }),
  );

  app.notFound(async (c) => {
    const notFoundPath = join(root, "404.html");
    if (existsSync(notFoundPath)) {
      const page = await readFile(notFoundPath, "utf-8");
      return c.html(page, 404);
    }
    return c.text("Not Found", 404);
  });

  app.onError((error, c) => {
    logger.error(`Failed to serve ${c.req.path}`, error);
    return c.text("Internal Server Error", 500);
  });

  return app;
}
