// backend/services/shared/http/errors.ts
import type { ZodError } from "zod";

/** One entry of the problem+json `errors` array. */
export type ProblemIssue = {
  path: string;
  code: string;
  message: string;
};

export type HttpErrorInit = {
  status: number;
  code: string;
  title: string;
  detail: string;
  errors?: ProblemIssue[];
};

/**
 * Base for every error a handler throws on purpose.
 * errorProblemJson() turns these into RFC 7807 bodies; anything else is a 500.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly title: string;
  readonly errors?: ProblemIssue[];

  constructor(init: HttpErrorInit) {
    super(init.detail);
    this.name = new.target.name;
    this.status = init.status;
    this.code = init.code;
    this.title = init.title;
    this.errors = init.errors;
  }
}

export function zodIssues(error: ZodError): ProblemIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}
