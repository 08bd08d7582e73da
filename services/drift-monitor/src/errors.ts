import type { ZodError, ZodIssue } from 'zod';

export type ErrorCode =
  | 'config_invalid'
  | 'reference_missing'
  | 'reference_unreadable'
  | 'reference_empty'
  | 'cycle_in_progress'
  | 'invalid_input';

export class DriftMonitorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends DriftMonitorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config_invalid', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** No baseline means no comparison: this one aborts the cycle. */
export class ReferenceDataError extends DriftMonitorError {}

export class CycleInProgressError extends DriftMonitorError {
  constructor() {
    super('cycle_in_progress', 'A monitoring cycle is already running in this process');
  }
}

/** A tool call whose input failed validation; the caller's fault, unlike any later parse. */
export class InvalidToolInputError extends DriftMonitorError {
  readonly issues: ZodIssue[];

  constructor(tool: string, cause: ZodError) {
    super('invalid_input', `Invalid input for ${tool}`, { cause });
    this.issues = cause.issues;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
