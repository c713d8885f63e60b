// backend/services/hero/src/sources/HeroSource.ts
import { z } from "zod";
import type { HeroRecord } from "../contracts/hero";

/**
 * One fetch contract, two providers. Implementations resolve a canonical
 * record or reject with HeroNotFoundError / SourceUnavailableError.
 */
export interface HeroSource {
  readonly kind: "official-api" | "static-dataset";
  fetchHero(name: string): Promise<HeroRecord>;
}

/** Provider entry: both providers nest stats under `powerstats`. */
const zProviderHero = z.object({
  name: z.string(),
  powerstats: z
    .object({
      intelligence: z.unknown(),
      strength: z.unknown(),
      speed: z.unknown(),
      power: z.unknown(),
    })
    .partial()
    .nullish(),
});
type ProviderHero = z.infer<typeof zProviderHero>;

const INT_RE = /^-?\d+$/;

/**
 * Numbers are truncated to integers, digit strings parsed.
 * Anything else ("null", "unknown", "", missing) is null.
 */
export function normalizeStat(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string" && INT_RE.test(value.trim())) {
    const n = Number(value.trim());
    return Number.isSafeInteger(n) ? n : null;
  }
  return null;
}

function toHeroRecord(entry: ProviderHero): HeroRecord {
  const stats = entry.powerstats;
  return {
    name: entry.name,
    intelligence: normalizeStat(stats?.intelligence),
    strength: normalizeStat(stats?.strength),
    speed: normalizeStat(stats?.speed),
    power: normalizeStat(stats?.power),
  };
}

/**
 * First candidate whose name equals `name` ignoring case; partial matches
 * never count. Entries without a string name are skipped.
 */
export function pickExactMatch(
  candidates: readonly unknown[],
  name: string
): HeroRecord | null {
  const target = name.trim().toLowerCase();
  for (const candidate of candidates) {
    const parsed = zProviderHero.safeParse(candidate);
    if (parsed.success && parsed.data.name.toLowerCase() === target) {
      return toHeroRecord(parsed.data);
    }
  }
  return null;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
