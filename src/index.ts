import { CommanderError } from "commander";
import { parseConfig } from "./config";
import { DohClient } from "./doh-client";
import { ConfigError, describeError } from "./errors";
import { createQueryHandler } from "./handler";
import { createLogger } from "./logger";
import { shutdown, startServer } from "./server";
import { UpstreamResolver } from "./upstream";

const logger = createLogger("main");

async function main() {
  const config = parseConfig(process.argv.slice(2));

  const client = new DohClient({ timeoutSeconds: config.timeoutSeconds });
  const resolver = new UpstreamResolver(config.upstreams, client);
  const server = await startServer(config.address, createQueryHandler(resolver));

  const bound = server.address();
  logger.info(`Listening at ${bound.host}:${bound.port}`);
  logger.info(`Upstreams: ${config.upstreams.join(", ")}`);

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down DNS proxy...`);
    void shutdown(server);
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  if (error instanceof ConfigError) {
    logger.fatal(error.message);
  } else {
    logger.fatal(`Startup failed: ${describeError(error)}`);
  }
  process.exitCode = 1;
});
