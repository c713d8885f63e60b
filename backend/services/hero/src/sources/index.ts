// backend/services/hero/src/sources/index.ts
import type { HeroSourceConfig } from "../config";
import type { HeroSource } from "./HeroSource";
import { OfficialApiSource } from "./officialApiSource";
import { StaticDatasetSource } from "./staticDatasetSource";

/** Resolved once at startup: a token selects the official API, no token the static dataset. */
export function selectHeroSource(cfg: HeroSourceConfig): HeroSource {
  if (cfg.token) {
    return new OfficialApiSource({
      token: cfg.token,
      baseUrl: cfg.apiBaseUrl,
      timeoutMs: cfg.timeoutMs,
    });
  }
  return new StaticDatasetSource({
    url: cfg.datasetUrl,
    path: cfg.datasetPath,
    timeoutMs: cfg.timeoutMs,
  });
}

export type { HeroSource } from "./HeroSource";
