import type { ZodError } from "zod";
import type { Backend } from "./backends.js";

export class CadProtocolError extends Error {
  readonly issues: string[];

  constructor(
    readonly backend: Backend,
    readonly method: string,
    cause: ZodError,
  ) {
    const issues = cause.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    super(`${backend}: malformed ${method} response (${issues.join("; ")})`);
    this.name = "CadProtocolError";
    this.issues = issues;
  }
}

/** The backend could not be reached at all: refused, reset, or no route. */
export class CadUnreachableError extends Error {
  constructor(
    readonly backend: Backend,
    readonly method: string,
    message: string,
  ) {
    super(`${backend}: ${method} failed, backend unreachable (${message})`);
    this.name = "CadUnreachableError";
  }
}
