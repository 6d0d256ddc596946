import { z } from "@coi-serve/utils";

export const DEFAULT_BANNER =
  "Serving with cross-origin isolation (COOP same-origin, COEP require-corp)";

/**
 * Webserver configuration schema
 */
export const webserverConfigSchema = z.object({
  port: z
    .number()
    .int()
    .min(0)
    .max(65535)
    .describe("TCP port to listen on; 0 picks a free port")
    .default(8080),
  hostname: z
    .string()
    .min(1)
    .describe("Address to bind the listener to")
    .default("0.0.0.0"),
  rootDir: z
    .string()
    .describe("Directory to serve, relative to the working directory")
    .default("."),
  banner: z
    .string()
    .describe("Line printed once the server is listening")
    .default(DEFAULT_BANNER),
});

export type WebserverConfig = z.infer<typeof webserverConfigSchema>;
export type WebserverConfigInput = z.input<typeof webserverConfigSchema>;

export const defaultWebserverConfig: WebserverConfig =
  webserverConfigSchema.parse({});
