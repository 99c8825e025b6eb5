import "dotenv/config";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { createServices } from "./services";
import { createLogger } from "./utils/logger";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const services = createServices(config, logger);

const app = createApp({ services, logger, corsOrigins: config.corsOrigins });

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, env: config.env }, "server_listening");
});

const shutdown = (signal: string) => {
  logger.info({ signal }, "server_shutdown_start");
  server.close((err) => {
    if (err) {
      logger.error({ err }, "server_shutdown_error");
      process.exitCode = 1;
      return process.exit();
    }
    logger.info("server_shutdown_complete");
    process.exit();
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
