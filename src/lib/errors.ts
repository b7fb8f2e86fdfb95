/**
 * Error types for beeline
 *
 * Every error the CLI prints on exit derives from BeelineError, so the entry
 * point can tell expected failures (bad config, API rejections, a malformed
 * edit) from programming errors.
 */

import type { DatapointOperation } from "./datapoints/types";

export class BeelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BeelineError";
  }
}

/** Missing or invalid environment configuration. Raised before any request. */
export class ConfigError extends BeelineError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ApiErrorContext {
  method: string;
  path: string;
  status?: number;
  goal?: string;
}

/** Beeminder answered with a non-2xx status or a body we could not decode. */
export class ApiError extends BeelineError {
  public readonly method: string;
  public readonly path: string;
  public readonly status?: number;
  public readonly goal?: string;

  constructor(message: string, context: ApiErrorContext, options?: ErrorOptions) {
    super(message, options);
    this.name = "ApiError";
    this.method = context.method;
    this.path = context.path;
    this.status = context.status;
    this.goal = context.goal;
  }
}

/** The edited datapoint table could not be read back. Nothing was applied. */
export class TableParseError extends BeelineError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly text: string
  ) {
    super(`Line ${line}: ${message}: ${JSON.stringify(text)}`);
    this.name = "TableParseError";
  }
}

export class EditorError extends BeelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EditorError";
  }
}

export interface OperationFailure {
  operation: DatapointOperation;
  error: unknown;
}

/** One or more datapoint operations failed after all of them were attempted. */
export class ApplyError extends BeelineError {
  constructor(
    public readonly goal: string,
    public readonly failures: OperationFailure[]
  ) {
    const noun = failures.length === 1 ? "operation" : "operations";
    super(`${failures.length} datapoint ${noun} failed for goal '${goal}'`);
    this.name = "ApplyError";
  }
}

/**
 * Flatten an error and its causes into a single line for the terminal.
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current !== undefined && parts.length < 5) {
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }

  return parts.join(": ");
}
