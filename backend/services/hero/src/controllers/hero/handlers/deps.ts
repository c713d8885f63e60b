// backend/services/hero/src/controllers/hero/handlers/deps.ts
import type { HeroSource } from "../../../sources/HeroSource";
import type { HeroRepo } from "../../../repo/heroRepo";

/** Collaborators the hero handlers are built with (see app.ts). */
export type HeroHandlerDeps = {
  source: HeroSource;
  repo: HeroRepo;
};
