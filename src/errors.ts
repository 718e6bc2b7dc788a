/**
 * Error taxonomy for touchpilot.
 *
 * Only ConfigurationError is meant to reach the operator. Everything else is
 * absorbed by the agent loop into the step history or a failed run result.
 */

export type ErrorKind =
  | "driver"
  | "timeout"
  | "parse"
  | "planner"
  | "stall"
  | "runaway_repetition"
  | "configuration"
  | "aborted";

export class AgentError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A device call failed or produced unusable output. */
export class DriverError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("driver", message, options);
  }
}

/** A device or planner call exceeded its deadline. */
export class TimeoutError extends AgentError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("timeout", `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** The planner threw, timed out, or returned nothing. */
export class PlannerError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("planner", message, options);
  }
}

export class ParseError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse", message, options);
  }
}

export class StallError extends AgentError {
  constructor(message: string) {
    super("stall", message);
  }
}

export class RunawayRepetitionError extends AgentError {
  constructor(message: string) {
    super("runaway_repetition", message);
  }
}

export class ConfigurationError extends AgentError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("configuration", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
