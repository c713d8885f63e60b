// backend/services/hero/src/filters/mongoFilter.ts
import type { FilterQuery } from "mongoose";
import type { HeroDocument } from "../models/Hero";
import type { Comparison, HeroPredicate } from "./heroFilters";

type StatCondition = { $eq: number } | { $gte: number } | { $lte: number };

const STAT_CONDITIONS: Record<Comparison, (v: number) => StatCondition> = {
  eq: (v) => ({ $eq: v }),
  gte: (v) => ({ $gte: v }),
  lte: (v) => ({ $lte: v }),
};

function toCondition(p: HeroPredicate): FilterQuery<HeroDocument> {
  switch (p.field) {
    case "name":
      return { name: p.value };
    case "intelligence":
      return { intelligence: STAT_CONDITIONS[p.op](p.value) };
    case "strength":
      return { strength: STAT_CONDITIONS[p.op](p.value) };
    case "speed":
      return { speed: STAT_CONDITIONS[p.op](p.value) };
    case "power":
      return { power: STAT_CONDITIONS[p.op](p.value) };
  }
}

/**
 * AND of all predicates. Kept as $and (not a merged object) so repeated
 * parameters on one field all apply. Mongo comparisons never match null.
 */
export function toMongoFilter(
  predicates: readonly HeroPredicate[]
): FilterQuery<HeroDocument> {
  if (predicates.length === 0) return {};
  return { $and: predicates.map(toCondition) };
}
