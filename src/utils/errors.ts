import type { ErrorObject } from "ajv";

export type FatalPreconditionReason =
  | "runtime-unreachable"
  | "environment-missing"
  | "environment-not-running"
  | "devices-dir-missing"
  | "no-configurations";

/**
 * Condition bloquante détectée avant de toucher au moindre appareil.
 */
export class FatalPreconditionError extends Error {
  readonly reason: FatalPreconditionReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: FatalPreconditionReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "FatalPreconditionError";
    this.reason = reason;
    this.details = details;
  }
}

export class SchemaValidationError extends Error {
  readonly details: ReadonlyArray<ErrorObject>;

  constructor(message: string, details: ReadonlyArray<ErrorObject>) {
    super(message);
    this.name = "SchemaValidationError";
    this.details = details;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface FileSystemError extends Error {
  code?: string;
}

export function isFileSystemError(input: unknown): input is FileSystemError {
  return input instanceof Error && "code" in input && typeof input.code === "string";
}
