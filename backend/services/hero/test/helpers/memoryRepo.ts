// backend/services/hero/test/helpers/memoryRepo.ts
import { Types } from "mongoose";
import type { HeroRecord, HeroStat } from "../../src/contracts/hero";
import type { HeroPredicate } from "../../src/filters/heroFilters";
import type { HeroRepo, StoredHero, UpsertResult } from "../../src/repo/heroRepo";

function statOf(hero: HeroRecord, field: HeroStat): number | null {
  switch (field) {
    case "intelligence":
      return hero.intelligence;
    case "strength":
      return hero.strength;
    case "speed":
      return hero.speed;
    case "power":
      return hero.power;
  }
}

function matches(hero: StoredHero, p: HeroPredicate): boolean {
  if (p.field === "name") return hero.name === p.value;
  const v = statOf(hero, p.field);
  if (v === null) return false;
  if (p.op === "gte") return v >= p.value;
  if (p.op === "lte") return v <= p.value;
  return v === p.value;
}

/** In-process HeroRepo with the same semantics as MongoHeroRepo. */
export class InMemoryHeroRepo implements HeroRepo {
  readonly rows: StoredHero[] = [];

  async upsert(record: HeroRecord): Promise<UpsertResult> {
    const now = new Date();
    const existing = this.rows.find((r) => r.name === record.name);
    if (existing) {
      existing.intelligence = record.intelligence;
      existing.strength = record.strength;
      existing.speed = record.speed;
      existing.power = record.power;
      existing.dateLastUpdated = now;
      return { hero: { ...existing }, created: false };
    }
    const hero: StoredHero = {
      ...record,
      id: new Types.ObjectId().toHexString(),
      dateCreated: now,
      dateLastUpdated: now,
    };
    this.rows.push(hero);
    return { hero: { ...hero }, created: true };
  }

  async query(predicates: readonly HeroPredicate[]): Promise<StoredHero[]> {
    return this.rows
      .filter((row) => predicates.every((p) => matches(row, p)))
      .map((row) => ({ ...row }));
  }
}
