import type { ErrorResult } from "../lib/contracts.js";
import { toErrorMessage } from "./telemetry.js";

export type RepurposeErrorCode = "not_found" | "no_match" | "configuration" | "collaborator";

export class RepurposeError extends Error {
  readonly code: RepurposeErrorCode;

  constructor(code: RepurposeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RepurposeError";
    this.code = code;
  }
}

export class NotFoundError extends RepurposeError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

export class NoMatchError extends RepurposeError {
  constructor(message: string) {
    super("no_match", message);
    this.name = "NoMatchError";
  }
}

export class ConfigurationError extends RepurposeError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

/** Wraps a failure raised by the entity store or the embedding provider. */
export class CollaboratorError extends RepurposeError {
  constructor(operation: string, cause: unknown) {
    super("collaborator", `${operation} failed: ${toErrorMessage(cause)}`, { cause });
    this.name = "CollaboratorError";
  }
}

export function toErrorResult(error: unknown): ErrorResult {
  if (error instanceof RepurposeError) return { error: error.message };
  return { error: `Internal error: ${toErrorMessage(error)}` };
}
