// backend/services/hero/index.ts
/**
 * Start-up: load env (bootstrap) → config → logger → DB → HTTP.
 */

import { loadedEnvFiles } from "./src/bootstrap";

import type { Server } from "http";
import { logger, initLogger } from "../shared/utils/logger";
import { createHeroApp } from "./src/app";
import { loadHeroConfig } from "./src/config";
import { connectDb, disconnectDb, isDbReady } from "./src/db";
import { MongoHeroRepo } from "./src/repo/heroRepo";
import { selectHeroSource } from "./src/sources";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "[hero] Unhandled Promise Rejection");
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, "[hero] Uncaught Exception");
});

function shutdown(server: Server, signal: string) {
  logger.info({ signal }, "[hero] shutting down");
  server.close(() => {
    disconnectDb()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "[hero] disconnect failed");
        process.exit(1);
      });
  });
}

async function start() {
  const config = loadHeroConfig();
  initLogger({ service: config.serviceName, level: config.logLevel });
  logger.debug({ envFiles: loadedEnvFiles }, "[hero] env loaded");

  await connectDb(config.mongoUri);

  const source = selectHeroSource(config.source);
  const app = createHeroApp({
    serviceName: config.serviceName,
    source,
    repo: new MongoHeroRepo(),
    readiness: isDbReady,
  });

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, source: source.kind, env: config.env },
      `[${config.serviceName}] listening`
    );
  });

  process.once("SIGINT", () => shutdown(server, "SIGINT"));
  process.once("SIGTERM", () => shutdown(server, "SIGTERM"));
}

start().catch((err: unknown) => {
  logger.error({ err }, "failed to start hero service");
  process.exit(1);
});
