// backend/services/hero/src/bootstrap.ts
/**
 * Side-effect module: load env files before config is read.
 * Service .env first, then repo root .env; injected env beats both.
 */

import path from "path";
import { loadEnvFiles } from "../../shared/config/env";

export const SERVICE_ROOT = path.resolve(__dirname, "..");
export const REPO_ROOT = path.resolve(SERVICE_ROOT, "../../..");

export const loadedEnvFiles = loadEnvFiles([
  path.join(SERVICE_ROOT, ".env"),
  path.join(REPO_ROOT, ".env"),
]);
