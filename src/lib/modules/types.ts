import type { CommandRunner, ProgressEvent } from "../exec.js";
import type {
  Action,
  ApplyResult,
  CheckResult,
  DesiredUnit,
  ReconcileSettings,
} from "../types.js";

export interface ModuleContext {
  runner: CommandRunner;
  settings: ReconcileSettings;
  /** The whole desired state, for cross-unit lookups such as paused services. */
  units: ReadonlyMap<string, DesiredUnit>;
  now: () => Date;
  signal?: AbortSignal;
  onProgress?: (unit: string, event: ProgressEvent) => void;
}

export interface PackageSnapshot {
  kind: "package";
  present: boolean;
  version: string | null;
}

export interface ServiceSnapshot {
  kind: "service";
  exists: boolean;
  enabled: boolean;
  /** Enablement cannot be toggled (static, indirect, generated units). */
  fixed: boolean;
  active: boolean;
}

export interface FileSnapshot {
  kind: "file";
  existed: boolean;
  backup: string | null;
  mode: number | null;
}

export type UnitSnapshot = PackageSnapshot | ServiceSnapshot | FileSnapshot;

/**
 * One kind of unit: how to observe it, and how to move it toward (and back
 * from) its desired state. check() never mutates the host.
 */
export interface UnitModule<U extends DesiredUnit, S extends UnitSnapshot> {
  readonly kind: U["kind"];
  check(unit: U, ctx: ModuleContext): Promise<CheckResult>;
  snapshot(unit: U, ctx: ModuleContext): Promise<S>;
  apply(action: Action, unit: U, snapshot: S, ctx: ModuleContext): Promise<ApplyResult>;
  rollback(action: Action, unit: U, snapshot: S, ctx: ModuleContext): Promise<ApplyResult>;
}
