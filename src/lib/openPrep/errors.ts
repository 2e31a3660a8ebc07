/**
 * Open-Prep error taxonomy
 *
 * - ConfigurationError: fatal, raised once at startup; no artifact is written
 * - InputError: the run input as a whole is unusable
 * - InvariantViolationError: a value that must never reach the artifact (NaN, Infinity)
 *
 * Per-candidate data problems are not errors; they become data-quality flags
 * or DegradedReason entries (see result.ts).
 */

export type OpenPrepErrorCode = "CONFIGURATION" | "INPUT" | "INVARIANT_VIOLATION";

export class OpenPrepError extends Error {
  constructor(
    message: string,
    public readonly code: OpenPrepErrorCode,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = "OpenPrepError";
  }
}

export class ConfigurationError extends OpenPrepError {
  constructor(message: string, details: string[] = []) {
    super(message, "CONFIGURATION", details);
    this.name = "ConfigurationError";
  }
}

export class InputError extends OpenPrepError {
  constructor(message: string, details: string[] = []) {
    super(message, "INPUT", details);
    this.name = "InputError";
  }
}

export class InvariantViolationError extends OpenPrepError {
  constructor(message: string, details: string[] = []) {
    super(message, "INVARIANT_VIOLATION", details);
    this.name = "InvariantViolationError";
  }
}

export function isOpenPrepError(error: unknown): error is OpenPrepError {
  return error instanceof OpenPrepError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
