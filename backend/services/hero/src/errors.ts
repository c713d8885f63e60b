// backend/services/hero/src/errors.ts
import { HttpError, type ProblemIssue } from "../../shared/http/errors";

/** Malformed or missing required input. */
export class InvalidRequestError extends HttpError {
  constructor(detail: string, errors?: ProblemIssue[]) {
    super({
      status: 400,
      code: "INVALID_REQUEST",
      title: "Bad Request",
      detail,
      errors,
    });
  }
}

/** A numeric filter received a value that is not an integer. */
export class InvalidFilterError extends HttpError {
  readonly param: string;

  constructor(param: string, value: string) {
    super({
      status: 400,
      code: "INVALID_FILTER",
      title: "Bad Request",
      detail: `Invalid numeric value for "${param}": "${value}"`,
    });
    this.param = param;
  }
}

/** The active source has no hero with that exact name. */
export class HeroNotFoundError extends HttpError {
  constructor(name: string) {
    super({
      status: 404,
      code: "HERO_NOT_FOUND",
      title: "Not Found",
      detail: `Hero "${name}" not found`,
    });
  }
}

/** The outbound call to the hero source failed or returned garbage. */
export class SourceUnavailableError extends HttpError {
  constructor(detail: string) {
    super({
      status: 502,
      code: "SOURCE_UNAVAILABLE",
      title: "Bad Gateway",
      detail,
    });
  }
}

/** /hero/ only answers GET and POST. */
export class MethodNotAllowedError extends HttpError {
  constructor(method: string, path: string) {
    super({
      status: 405,
      code: "METHOD_NOT_ALLOWED",
      title: "Method Not Allowed",
      detail: `Method ${method} is not allowed on ${path}`,
    });
  }
}
