// backend/services/hero/src/contracts/hero.ts
import { z } from "zod";
import { zObjectId } from "../../../shared/contracts/common";

/**
 * Hero contracts (Zod)
 * - zHeroRecord : canonical record, identical whichever source produced it
 * - zHeroDto    : stored hero as sent over the wire
 * - zHeroCreate : POST /hero/ body
 *
 * Stats are integers or null; a stat the source does not know is null, never 0.
 */

export const HERO_STATS = ["intelligence", "strength", "speed", "power"] as const;
export type HeroStat = (typeof HERO_STATS)[number];

const zStat = z.number().int().nullable();

export const zHeroRecord = z.object({
  name: z.string().min(1),
  intelligence: zStat,
  strength: zStat,
  speed: zStat,
  power: zStat,
});
export type HeroRecord = z.infer<typeof zHeroRecord>;

export const zHeroDto = zHeroRecord.extend({
  id: zObjectId,
  dateCreated: z.string(), // ISO string
  dateLastUpdated: z.string(), // ISO string
});
export type HeroDto = z.infer<typeof zHeroDto>;

export const zHeroListDto = z.array(zHeroDto);

export const zHeroCreate = z.object({
  name: z
    .string({
      required_error: "name is required",
      invalid_type_error: "name must be a string",
    })
    .trim()
    .min(1, "name must not be empty"),
});
