import { Hono } from "hono";
import type { Logger } from "@coi-serve/utils";
import type { HeaderSet } from "./header-set";
import type { StaticResponder } from "./static-responder";

export interface HeaderInjectingGatewayOptions {
  headers: HeaderSet;
  responder: StaticResponder;
  logger: Logger;
}

/**
 * Create the app every request enters through
 *
 * OPTIONS is answered here with an empty 200. Everything else is handed to
 * the responder untouched. Whatever comes back (file, 404, 501, 500) gets the
 * header set written over it before it leaves, so a header set here always
 * replaces a same-named header from the responder.
 */
export function createHeaderInjectingGateway(
  options: HeaderInjectingGatewayOptions,
): Hono {
  const { headers, responder, logger } = options;
  const app = new Hono();

  // Registered first so it is the last to touch the response
  app.use("*", async (c, next) => {
    await next();

    for (const [name, value] of headers) {
      c.header(name, value);
    }

    logger.info(`"${c.req.method} ${c.req.path}" ${c.res.status}`);
  });

  // CORS preflight
  app.options("*", (c) => c.body(null, 200));

  app.all("*", (c) => responder.fetch(c.req.raw));

  app.onError((error, c) => {
    logger.error(`Responder failed for ${c.req.method} ${c.req.path}`, error);
    return c.text("Internal Server Error", 500);
  });

  return app;
}
