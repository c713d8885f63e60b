// backend/services/shared/middleware/problemJson.ts

/**
 * RFC 7807 Problem+JSON for every failure path:
 * - notFoundProblemJson(): unknown routes under known prefixes.
 * - errorProblemJson(): final error handler. HttpError keeps its status/code;
 *   other errors carrying a 4xx status (body-parser) keep that status, with
 *   the title and code of that status;
 *   everything else is a generic 500 with no internals in the body.
 */

import { STATUS_CODES } from "http";
import type { ErrorRequestHandler, RequestHandler } from "express";
import { HttpError } from "../http/errors";
import { clean } from "../contracts/clean";
import type { Problem } from "../contracts/common";
import { logger } from "../utils/logger";

function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const raw =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof raw === "number" && raw >= 400 && raw < 500 ? raw : undefined;
}

function toProblem(err: unknown, instance?: string): Problem {
  if (err instanceof HttpError) {
    return clean({
      type: "about:blank",
      title: err.title,
      status: err.status,
      code: err.code,
      detail: err.message,
      errors: err.errors,
      instance,
    });
  }

  const status = clientStatusOf(err);
  if (status !== undefined) {
    const title = STATUS_CODES[status] ?? "Client Error";
    return clean({
      type: "about:blank",
      title,
      status,
      code: title.toUpperCase().replace(/[^A-Z0-9]+/g, "_"),
      detail: err instanceof Error ? err.message : "Malformed request",
      instance,
    });
  }

  return clean({
    type: "about:blank",
    title: "Internal Server Error",
    status: 500,
    detail: "Unexpected error",
    instance,
  });
}

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      res
        .status(404)
        .type("application/problem+json")
        .json(
          clean({
            type: "about:blank",
            title: "Not Found",
            status: 404,
            detail: "Route not found",
            instance: req.id === undefined ? undefined : String(req.id),
          })
        );
      return;
    }
    res.status(404).end();
  };
}

export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const instance = req.id === undefined ? undefined : String(req.id);
    const problem = toProblem(err, instance);
    const ctx = {
      requestId: instance,
      method: req.method,
      path: req.originalUrl,
      status: problem.status,
      code: problem.code,
    };

    if (problem.status >= 500) logger.error({ ...ctx, err }, "request error");
    else logger.warn({ ...ctx, detail: problem.detail }, "request rejected");

    res.status(problem.status).type("application/problem+json").json(problem);
  };
}
