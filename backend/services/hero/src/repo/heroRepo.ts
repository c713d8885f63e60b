// backend/services/hero/src/repo/heroRepo.ts
import type { Model, Types } from "mongoose";
import HeroModel, { type HeroDocument } from "../models/Hero";
import type { HeroRecord } from "../contracts/hero";
import type { HeroPredicate } from "../filters/heroFilters";
import { toMongoFilter } from "../filters/mongoFilter";

export type StoredHero = HeroRecord & {
  id: string;
  dateCreated: Date;
  dateLastUpdated: Date;
};

export type UpsertResult = { hero: StoredHero; created: boolean };

export interface HeroRepo {
  /** Create the row for record.name, or overwrite its stats if it exists. */
  upsert(record: HeroRecord): Promise<UpsertResult>;
  /** Rows matching every predicate, oldest first. */
  query(predicates: readonly HeroPredicate[]): Promise<StoredHero[]>;
}

type HeroRow = {
  _id: Types.ObjectId;
  name: string;
  intelligence?: number | null;
  strength?: number | null;
  speed?: number | null;
  power?: number | null;
  dateCreated: Date;
  dateLastUpdated: Date;
};

function toStoredHero(row: HeroRow): StoredHero {
  return {
    id: row._id.toHexString(),
    name: row.name,
    intelligence: row.intelligence ?? null,
    strength: row.strength ?? null,
    speed: row.speed ?? null,
    power: row.power ?? null,
    dateCreated: row.dateCreated,
    dateLastUpdated: row.dateLastUpdated,
  };
}

export class MongoHeroRepo implements HeroRepo {
  constructor(private readonly model: Model<HeroDocument> = HeroModel) {}

  /**
   * Single findOneAndUpdate with upsert, so create-vs-overwrite is decided
   * atomically by Mongo (unique index on name backs it up).
   * Full replace of the stats: a null from the source overwrites a stored number.
   */
  async upsert(record: HeroRecord): Promise<UpsertResult> {
    const res = await this.model.findOneAndUpdate(
      { name: record.name },
      {
        $set: {
          intelligence: record.intelligence,
          strength: record.strength,
          speed: record.speed,
          power: record.power,
        },
      },
      {
        upsert: true,
        new: true,
        runValidators: true,
        setDefaultsOnInsert: true,
        includeResultMetadata: true,
      }
    );

    const doc = res.value;
    if (!doc) {
      throw new Error(`Upsert for hero "${record.name}" returned no document`);
    }
    return {
      hero: toStoredHero(doc),
      created: res.lastErrorObject?.updatedExisting !== true,
    };
  }

  async query(predicates: readonly HeroPredicate[]): Promise<StoredHero[]> {
    const rows = await this.model
      .find(toMongoFilter(predicates))
      .sort({ _id: 1 })
      .lean();
    return rows.map(toStoredHero);
  }
}
