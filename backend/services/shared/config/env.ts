// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

export type EnvSource = Record<string, string | undefined>;

/** Load a single env file if it exists; expand vars; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return true;
}

/**
 * Load several env files in order. dotenv never overwrites a variable that is
 * already set, so injected env beats every file and earlier files beat later
 * ones: list the most specific file first.
 * Missing files are skipped; in production env is injected, not read from disk.
 * Returns the files that were actually loaded.
 */
export function loadEnvFiles(files: string[]): string[] {
  const loaded: string[] = [];
  for (const f of files) {
    const abs = path.resolve(f);
    if (loadIfExists(abs)) loaded.push(abs);
  }
  return loaded;
}

/** Require a non-empty env var; returns trimmed string. */
export function requireEnv(name: string, env: EnvSource = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

/** Optional env var; blank counts as missing. */
export function optionalEnv(
  name: string,
  fallback: string,
  env: EnvSource = process.env
): string {
  const v = env[name];
  return v && v.trim() ? v.trim() : fallback;
}

/** Require an env var that parses to a finite number. */
export function requireNumber(name: string, env: EnvSource = process.env): number {
  const raw = requireEnv(name, env);
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

/** Optional positive number with a default. */
export function optionalNumber(
  name: string,
  fallback: number,
  env: EnvSource = process.env
): number {
  const v = env[name];
  if (!v || !v.trim()) return fallback;
  const n = Number(v.trim());
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Invalid number for env var ${name}: "${v}"`);
  }
  return n;
}
