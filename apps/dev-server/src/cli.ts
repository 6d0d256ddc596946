import { getErrorMessage, Logger, z } from "@coi-serve/utils";
import {
  HeaderSet,
  ServerManager,
  defaultWebserverConfig,
  webserverConfigSchema,
  type WebserverConfigInput,
} from "@coi-serve/webserver";

export const USAGE = "Usage: coi-serve [port]";

/**
 * The command line could not be understood. Exits with status 2.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const portArgumentSchema = z
  .string()
  .regex(/^\d+$/, "must be a whole number")
  .transform(Number)
  .pipe(z.number().int().max(65535, "must be at most 65535"));

/**
 * Read the optional positional port from the arguments after the script name.
 */
export function parsePortArgument(args: readonly string[]): number {
  if (args.length > 1) {
    throw new CliUsageError(
      `Expected at most one argument, got ${args.length}`,
    );
  }

  const [raw] = args;
  if (raw === undefined) {
    return defaultWebserverConfig.port;
  }

  const result = portArgumentSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "invalid";
    throw new CliUsageError(`Invalid port "${raw}": ${reason}`);
  }
  return result.data;
}

export interface CliOverrides extends Omit<WebserverConfigInput, "port"> {
  logger?: Logger;
}

export interface RunningServer {
  url: string;
  manager: ServerManager;
  shutdown: (signal?: NodeJS.Signals) => Promise<void>;
}

/**
 * Parse arguments, start the server and hook SIGINT/SIGTERM up to a clean
 * stop. Exits the process on usage errors (2), start failures (1) and after
 * a signal-triggered stop (0).
 */
export async function handleCLI(
  args: readonly string[] = process.argv.slice(2),
  overrides: CliOverrides = {},
): Promise<RunningServer | undefined> {
  let port: number;
  try {
    port = parsePortArgument(args);
  } catch (error) {
    console.error(`${getErrorMessage(error)}\n${USAGE}`);
    process.exit(2);
    return undefined;
  }

  const { logger: providedLogger, ...configOverrides } = overrides;
  const config = webserverConfigSchema.parse({ ...configOverrides, port });
  const logger = providedLogger ?? Logger.create({ context: "coi-serve" });

  const manager = new ServerManager({
    logger,
    headers: HeaderSet.crossOriginIsolation(),
    rootDir: config.rootDir,
    port: config.port,
    hostname: config.hostname,
  });

  let url: string;
  try {
    url = await manager.start();
  } catch (error) {
    logger.error(`Failed to start: ${getErrorMessage(error)}`);
    process.exit(1);
    return undefined;
  }

  console.log(config.banner);
  console.log(`Serving ${manager.rootDir} at ${url}`);

  const shutdown = async (signal?: NodeJS.Signals): Promise<void> => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    logger.info(signal ? `Received ${signal}, stopping` : "Stopping");
    await manager.stop();
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
        process.exit(1);
      },
    );
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return { url, manager, shutdown };
}
