import type { Action } from "./types.js";

// ─────────────────────────────────────────────────────────────────────────────
// Error taxonomy
// ─────────────────────────────────────────────────────────────────────────────

export const ERROR_CODES = {
  malformedSpec: "MalformedSpec",
  cyclicDependency: "CyclicDependency",
  probeFailure: "ProbeFailure",
  actionFailure: "ActionFailure",
  unsatisfiableOrder: "UnsatisfiableOrder",
  commandTimeout: "CommandTimeout",
  commandUnavailable: "CommandUnavailable",
  commandCancelled: "CommandCancelled",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ReconcileError";
  }
}

export interface SpecIssue {
  source: string;
  message: string;
  path?: string[];
}

export function formatIssue(issue: SpecIssue): string {
  return issue.path && issue.path.length > 0
    ? `${issue.source}: ${issue.path.join(".")}: ${issue.message}`
    : `${issue.source}: ${issue.message}`;
}

export class MalformedSpecError extends ReconcileError {
  constructor(public readonly issues: SpecIssue[]) {
    super(`Malformed desired state:\n${issues.map(formatIssue).join("\n")}`, ERROR_CODES.malformedSpec);
    this.name = "MalformedSpecError";
  }
}

export class CyclicDependencyError extends ReconcileError {
  constructor(public readonly cycle: string[]) {
    super(`Dependency cycle: ${cycle.join(" -> ")}`, ERROR_CODES.cyclicDependency);
    this.name = "CyclicDependencyError";
  }
}

export class ProbeFailureError extends ReconcileError {
  constructor(
    public readonly unit: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Probe failed for ${unit}: ${message}`, ERROR_CODES.probeFailure, cause);
    this.name = "ProbeFailureError";
  }
}

export class ActionFailureError extends ReconcileError {
  constructor(
    public readonly action: Pick<Action, "id" | "unit" | "operation">,
    message: string,
    public readonly exitCode: number | null = null,
    public readonly stderr = "",
    cause?: unknown,
  ) {
    super(`${action.operation} ${action.unit} failed: ${message}`, ERROR_CODES.actionFailure, cause);
    this.name = "ActionFailureError";
  }
}

export class UnsatisfiableOrderError extends ReconcileError {
  constructor(public readonly remaining: string[]) {
    super(`No valid action order for: ${remaining.join(", ")}`, ERROR_CODES.unsatisfiableOrder);
    this.name = "UnsatisfiableOrderError";
  }
}

export class CommandTimeoutError extends ReconcileError {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`, ERROR_CODES.commandTimeout);
    this.name = "CommandTimeoutError";
  }
}

export class CommandUnavailableError extends ReconcileError {
  constructor(
    public readonly command: string,
    cause?: unknown,
  ) {
    super(`Command could not be started: ${command}`, ERROR_CODES.commandUnavailable, cause);
    this.name = "CommandUnavailableError";
  }
}

export class CommandCancelledError extends ReconcileError {
  constructor(public readonly command: string) {
    super(`Command cancelled: ${command}`, ERROR_CODES.commandCancelled);
    this.name = "CommandCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
