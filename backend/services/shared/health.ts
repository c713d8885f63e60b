// backend/services/shared/health.ts
import express from "express";
import { logger } from "./utils/logger";

export type ReadinessFn = () => Promise<boolean> | boolean;

type Options = {
  service: string;
  /** /health/ready answers 200 only when this resolves truthy; otherwise 503. */
  readiness?: ReadinessFn;
};

/**
 * Exposes:
 *   GET /health/live    -> process is alive if the handler runs
 *   GET /health/ready   -> readiness (e.g. DB connected)
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();
  const { service, readiness } = opts;

  router.get("/health/live", (_req, res) => {
    res.json({
      ok: true,
      service,
      data: { status: "live", detail: { uptime: Math.floor(process.uptime()) } },
    });
  });

  router.get("/health/ready", async (_req, res) => {
    let ready = true;
    try {
      ready = readiness ? await readiness() : true;
    } catch (err) {
      logger.error({ service, err }, "ready_check_error");
      ready = false;
    }
    if (!ready) {
      res.status(503).json({ ok: false, service, data: { status: "not_ready" } });
      return;
    }
    res.json({ ok: true, service, data: { status: "ready" } });
  });

  return router;
}
