// backend/services/hero/src/dto/heroDto.ts
import type { HeroDto } from "../contracts/hero";
import type { StoredHero } from "../repo/heroRepo";

/** Stored hero -> wire shape (dates as ISO strings). */
export function toHeroDto(hero: StoredHero): HeroDto {
  return {
    id: hero.id,
    name: hero.name,
    intelligence: hero.intelligence,
    strength: hero.strength,
    speed: hero.speed,
    power: hero.power,
    dateCreated: hero.dateCreated.toISOString(),
    dateLastUpdated: hero.dateLastUpdated.toISOString(),
  };
}
