// backend/services/hero/src/config.ts

/**
 * Config is read once at startup into a frozen value and passed explicitly
 * to the source selector, repository wiring and app factory.
 * - No dotenv loading here (bootstrap.ts loads env files).
 * - Required vars fail fast with the variable name.
 */

import type { LevelWithSilent } from "pino";
import {
  optionalEnv,
  optionalNumber,
  requireEnv,
  requireNumber,
  type EnvSource,
} from "../../shared/config/env";
import { isLogLevel } from "../../shared/utils/logger";

export const DEFAULT_API_BASE_URL = "https://superheroapi.com/api";
export const DEFAULT_DATASET_URL =
  "https://akabab.github.io/superhero-api/api/all.json";
export const DEFAULT_SOURCE_TIMEOUT_MS = 30_000;

export type HeroSourceConfig = Readonly<{
  /** Empty selects the static dataset. */
  token: string;
  apiBaseUrl: string;
  datasetUrl: string;
  datasetPath?: string;
  timeoutMs: number;
}>;

export type HeroServiceConfig = Readonly<{
  env: string;
  serviceName: string;
  port: number;
  mongoUri: string;
  logLevel: LevelWithSilent;
  source: HeroSourceConfig;
}>;

function requireLogLevel(env: EnvSource): LevelWithSilent {
  const raw = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

export function loadHeroConfig(env: EnvSource = process.env): HeroServiceConfig {
  const datasetPath = optionalEnv("HERO_DATASET_PATH", "", env);

  const source: HeroSourceConfig = Object.freeze({
    token: optionalEnv("SUPERHERO_API_TOKEN", "", env),
    apiBaseUrl: optionalEnv("SUPERHERO_API_BASE_URL", DEFAULT_API_BASE_URL, env),
    datasetUrl: optionalEnv("HERO_DATASET_URL", DEFAULT_DATASET_URL, env),
    datasetPath: datasetPath || undefined,
    timeoutMs: optionalNumber(
      "HERO_SOURCE_TIMEOUT_MS",
      DEFAULT_SOURCE_TIMEOUT_MS,
      env
    ),
  });

  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development", env),
    serviceName: optionalEnv("HERO_SERVICE_NAME", "hero", env),
    port: requireNumber("HERO_PORT", env),
    mongoUri: requireEnv("HERO_MONGO_URI", env),
    logLevel: requireLogLevel(env),
    source,
  });
}
