// ─────────────────────────────────────────────────────────────────────────────
// Desired state
// ─────────────────────────────────────────────────────────────────────────────

export type UnitKind = "package" | "service" | "file";

export type PackageManager = "dnf" | "yum" | "apt";

interface UnitBase {
  name: string;
  kind: UnitKind;
  /** Names of units that must be reconciled first. Sorted, deduplicated. */
  dependencies: string[];
  description?: string;
}

export interface PackageUnit extends UnitBase {
  kind: "package";
  packageName: string;
  state: "present" | "absent";
  version?: string;
}

export interface ServiceUnit extends UnitBase {
  kind: "service";
  serviceName: string;
  state: "running" | "stopped";
  enabled: boolean;
  /** File units whose change requires a restart of this service. */
  restartOn: string[];
}

export interface FileUnit extends UnitBase {
  kind: "file";
  path: string;
  state: "present" | "absent";
  content?: string;
  sourcePath?: string;
  mode?: number;
  /** Service units stopped while this file is written. */
  pause: string[];
}

export type DesiredUnit = PackageUnit | ServiceUnit | FileUnit;

export interface ReconcileSettings {
  packageManager: PackageManager;
  commandTimeoutMs: number;
  concurrency: number;
  rollback: boolean;
  backupRetention: number;
}

export interface DesiredState {
  sourcePath: string;
  settings: ReconcileSettings;
  units: Map<string, DesiredUnit>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Observation and drift
// ─────────────────────────────────────────────────────────────────────────────

export interface ObservedState {
  unit: string;
  present: boolean;
  /** Content hash for files, version for packages, "enabled/active" for services. */
  fingerprint: string | null;
  checkedAt: string;
  detail?: Record<string, string | number | boolean>;
}

export type DriftStatus = "in-sync" | "drifted" | "missing" | "unknown";

export type FileDriftKind =
  | "in-sync"
  | "desired-changed"
  | "host-changed"
  | "both-changed"
  | "never-synced";

export interface CheckResult {
  status: Exclude<DriftStatus, "unknown">;
  message: string;
  observed: ObservedState;
  diff?: string;
  driftKind?: FileDriftKind;
}

export interface DriftEntry {
  unit: string;
  kind: UnitKind;
  status: DriftStatus;
  message: string;
  observed?: ObservedState;
  diff?: string;
  driftKind?: FileDriftKind;
  error?: string;
}

export interface DriftReport {
  entries: DriftEntry[];
  /** Units whose status is drifted or missing. */
  drifted: string[];
  unknown: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Plan and execution
// ─────────────────────────────────────────────────────────────────────────────

export type Operation =
  | "install"
  | "remove"
  | "configure"
  | "enable"
  | "disable"
  | "restart"
  | "rollback";

export interface Action {
  id: string;
  unit: string;
  kind: UnitKind;
  operation: Operation;
  rank: number;
  /** Ids of actions that must be applied before this one starts. */
  after: string[];
  reason: string;
  /** Planned files in a drifted running service's restartOn; it is restarted if already active. */
  triggers?: string[];
}

export interface HeldUnit {
  unit: string;
  blockedBy: string;
}

export interface Plan {
  actions: Action[];
  held: HeldUnit[];
}

export interface ApplyResult {
  changed: boolean;
  message: string;
  backup?: string;
}

export type OutcomeStatus = "applied" | "failed" | "skipped" | "rolled-back";

export interface ActionOutcome {
  action: Action;
  status: OutcomeStatus;
  message: string;
  stderr?: string;
  startedAt?: string;
  finishedAt?: string;
}

export interface ReconciliationReport {
  startedAt: string;
  finishedAt: string;
  outcomes: readonly ActionOutcome[];
  rollbacks: readonly ActionOutcome[];
  probeFailures: readonly DriftEntry[];
  held: readonly HeldUnit[];
  summary: {
    applied: number;
    failed: number;
    skipped: number;
    rolledBack: number;
  };
}
