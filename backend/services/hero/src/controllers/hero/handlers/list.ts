// backend/services/hero/src/controllers/hero/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { respond } from "../../../../../shared/contracts/common";
import { logger } from "../../../../../shared/utils/logger";
import { zHeroListDto } from "../../../contracts/hero";
import { toHeroDto } from "../../../dto/heroDto";
import { buildHeroFilters } from "../../../filters/heroFilters";
import type { HeroHandlerDeps } from "./deps";

// GET /hero/?name=&intelligence=&power__gte=&speed__lte=...
export function makeList({ repo }: Pick<HeroHandlerDeps, "repo">): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = String(req.id ?? "");
    logger.debug({ requestId }, "[HeroHandlers.list] enter");

    const predicates = buildHeroFilters(req.query);
    const heroes = await repo.query(predicates);

    logger.debug(
      { requestId, filters: predicates.length, count: heroes.length },
      "[HeroHandlers.list] exit"
    );
    return respond(res, zHeroListDto, heroes.map(toHeroDto));
  });
}
