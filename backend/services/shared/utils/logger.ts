// backend/services/shared/utils/logger.ts
import pino, { type LoggerOptions, type LevelWithSilent } from "pino";

/**
 * Root pino logger shared by every service module.
 *
 * Notes:
 * - Stdout only; shipping logs elsewhere is the platform's job.
 * - Level starts from LOG_LEVEL (default "info") so tests can silence it
 *   before anything is imported; entrypoints call initLogger() once config
 *   is loaded.
 */

const validLevels: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function initialLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim();
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

const pinoOptions: LoggerOptions = {
  level: initialLevel(),
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.headers['x-api-key']",
      "req.body.token",
      "req.body.apiKey",
      "res.headers['set-cookie']",
      "err.config.headers.authorization",
      "err.config.url",
    ],
  },
};

export const logger = pino(pinoOptions);

/** Tag the root logger with the service name and apply the configured level. */
export function initLogger(opts: { service: string; level: LevelWithSilent }) {
  logger.setBindings({ service: opts.service });
  logger.level = opts.level;
  return logger;
}
