// backend/services/hero/src/app.ts
/**
 * Assembly order: httpLogger (request id) → health (open) → parsers →
 * routes → 404 → error.
 * Collaborators come in as arguments; index.ts builds them from config,
 * tests hand in stand-ins.
 */

import express, { type Express } from "express";
import { makeHttpLogger } from "../../shared/middleware/httpLogger";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "../../shared/middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../../shared/health";
import { heroRoutes } from "./routes/heroRoutes";
import type { HeroSource } from "./sources/HeroSource";
import type { HeroRepo } from "./repo/heroRepo";

export type HeroAppDeps = {
  serviceName: string;
  source: HeroSource;
  repo: HeroRepo;
  readiness?: ReadinessFn;
};

export function createHeroApp(deps: HeroAppDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  // Flat key=value pairs only; repeated keys become arrays.
  app.set("query parser", "simple");

  app.use(makeHttpLogger(deps.serviceName));

  app.use(
    createHealthRouter({ service: deps.serviceName, readiness: deps.readiness })
  );

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use("/hero", heroRoutes({ source: deps.source, repo: deps.repo }));

  app.use(notFoundProblemJson(["/hero", "/health"]));
  app.use(errorProblemJson());

  return app;
}
