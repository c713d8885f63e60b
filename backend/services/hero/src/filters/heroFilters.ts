// backend/services/hero/src/filters/heroFilters.ts
import { HERO_STATS, type HeroStat } from "../contracts/hero";
import { InvalidFilterError } from "../errors";

export type Comparison = "eq" | "gte" | "lte";

/** One comparison derived from one query parameter. */
export type HeroPredicate =
  | { field: "name"; op: "eq"; value: string }
  | { field: HeroStat; op: Comparison; value: number };

type ParamSpec = { field: "name" } | { field: HeroStat; op: Comparison };

const SUFFIXES: ReadonlyArray<readonly [string, Comparison]> = [
  ["", "eq"],
  ["__gte", "gte"],
  ["__lte", "lte"],
];

/**
 * Every recognized parameter name, spelled out from the closed set of stats
 * and suffixes: intelligence, intelligence__gte, intelligence__lte, ... name.
 */
const PARAMS: ReadonlyMap<string, ParamSpec> = new Map<string, ParamSpec>([
  ["name", { field: "name" }],
  ...HERO_STATS.flatMap((field) =>
    SUFFIXES.map(
      ([suffix, op]): [string, ParamSpec] => [`${field}${suffix}`, { field, op }]
    )
  ),
]);

const INT_RE = /^-?\d+$/;

function parseInteger(param: string, raw: string): number {
  const trimmed = raw.trim();
  const n = Number(trimmed);
  if (!INT_RE.test(trimmed) || !Number.isSafeInteger(n)) {
    throw new InvalidFilterError(param, raw);
  }
  return n;
}

/** Query values arrive as a string, or an array when a parameter repeats. */
function valuesOf(param: string, raw: unknown): string[] {
  if (typeof raw === "string") return [raw];
  if (Array.isArray(raw) && raw.every((v): v is string => typeof v === "string")) {
    return raw;
  }
  throw new InvalidFilterError(param, String(raw));
}

/**
 * Translate query parameters into a conjunction of predicates.
 * Unknown parameters are ignored; an empty result means "everything".
 */
export function buildHeroFilters(query: Record<string, unknown>): HeroPredicate[] {
  const predicates: HeroPredicate[] = [];
  for (const [param, raw] of Object.entries(query)) {
    const spec = PARAMS.get(param);
    if (!spec || raw === undefined) continue;

    for (const value of valuesOf(param, raw)) {
      if (spec.field === "name") {
        predicates.push({ field: "name", op: "eq", value });
      } else {
        predicates.push({
          field: spec.field,
          op: spec.op,
          value: parseInteger(param, value),
        });
      }
    }
  }
  return predicates;
}
