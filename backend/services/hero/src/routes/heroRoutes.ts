// backend/services/hero/src/routes/heroRoutes.ts
import { Router } from "express";
import { makeCreate } from "../controllers/hero/handlers/create";
import { makeList } from "../controllers/hero/handlers/list";
import type { HeroHandlerDeps } from "../controllers/hero/handlers/deps";
import { MethodNotAllowedError } from "../errors";

/**
 * Mounted at /hero (non-strict routing, so /hero and /hero/ both match).
 * - POST / : fetch + upsert
 * - GET  / : filtered list
 * - any other method on / : 405 with an Allow header
 */
export function heroRoutes(deps: HeroHandlerDeps): Router {
  const router = Router();

  // one-liners only; handlers hold the logic
  router.post("/", makeCreate(deps));
  router.get("/", makeList(deps));
  router.all("/", (req, res, next) => {
    res.set("Allow", "GET, HEAD, POST");
    next(new MethodNotAllowedError(req.method, req.originalUrl));
  });

  return router;
}
