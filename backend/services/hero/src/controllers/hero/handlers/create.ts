// backend/services/hero/src/controllers/hero/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { respond } from "../../../../../shared/contracts/common";
import { zodIssues } from "../../../../../shared/http/errors";
import { logger } from "../../../../../shared/utils/logger";
import { zHeroCreate, zHeroDto } from "../../../contracts/hero";
import { toHeroDto } from "../../../dto/heroDto";
import { InvalidRequestError } from "../../../errors";
import type { HeroHandlerDeps } from "./deps";

/**
 * POST /hero/
 * - Body: { name } as JSON or form-encoded.
 * - Fetch from the active source, then upsert by the source's spelling of the name.
 * - 201 when the row was created, 200 when an existing row was overwritten.
 */
export function makeCreate({ source, repo }: HeroHandlerDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = String(req.id ?? "");
    logger.debug({ requestId }, "[HeroHandlers.create] enter");

    const parsed = zHeroCreate.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw new InvalidRequestError(
        'Parameter "name" is required',
        zodIssues(parsed.error)
      );
    }

    const record = await source.fetchHero(parsed.data.name);
    const { hero, created } = await repo.upsert(record);

    logger.debug(
      { requestId, heroId: hero.id, created, source: source.kind },
      "[HeroHandlers.create] exit"
    );
    return respond(res, zHeroDto, toHeroDto(hero), created ? 201 : 200);
  });
}
