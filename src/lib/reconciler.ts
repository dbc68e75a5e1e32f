import { detectDrift, isConverged } from "./drift.js";
import { systemRunner, type CommandRunner, type ProgressEvent } from "./exec.js";
import { executePlan } from "./executor.js";
import { logDebug, logInfo } from "./log.js";
import { createHostDrivers, type HostDrivers } from "./modules/index.js";
import { planActions } from "./planner.js";
import { reportSucceeded } from "./report.js";
import type {
  Action,
  ActionOutcome,
  DesiredState,
  DriftReport,
  Plan,
  ReconcileSettings,
  ReconciliationReport,
} from "./types.js";

export type ReconcileMode = "check" | "plan" | "apply";

export type ReconcilePhase = "probing" | "planning" | "applying" | "verifying" | "done";

export interface ReconcileOptions {
  mode: ReconcileMode;
  runner?: CommandRunner;
  /** Replaces the host modules entirely; tests and dry harnesses use this. */
  drivers?: HostDrivers;
  /** Command-line overrides of the document's settings. */
  settings?: Partial<ReconcileSettings>;
  signal?: AbortSignal;
  now?: () => Date;
  onPhase?: (phase: ReconcilePhase) => void;
  onStart?: (action: Action) => void;
  onOutcome?: (outcome: ActionOutcome) => void;
  onProgress?: (unit: string, event: ProgressEvent) => void;
}

export interface ReconcileResult {
  desired: DesiredState;
  settings: ReconcileSettings;
  drift: DriftReport;
  plan: Plan | null;
  report: ReconciliationReport | null;
  /** Drift observed again after applying; null when nothing was applied. */
  verification: DriftReport | null;
  converged: boolean;
}

export function resolveSettings(
  base: ReconcileSettings,
  overrides: Partial<ReconcileSettings> = {},
): ReconcileSettings {
  const settings = { ...base };
  if (overrides.packageManager !== undefined) settings.packageManager = overrides.packageManager;
  if (overrides.commandTimeoutMs !== undefined) settings.commandTimeoutMs = overrides.commandTimeoutMs;
  if (overrides.concurrency !== undefined) settings.concurrency = overrides.concurrency;
  if (overrides.rollback !== undefined) settings.rollback = overrides.rollback;
  if (overrides.backupRetention !== undefined) settings.backupRetention = overrides.backupRetention;
  return settings;
}

/**
 * Observe, plan and (in apply mode) execute. Unknown units are reported and
 * never acted on; after an apply the host is probed again so the result
 * says whether it actually converged.
 */
export async function reconcile(desired: DesiredState, options: ReconcileOptions): Promise<ReconcileResult> {
  const now = options.now ?? (() => new Date());
  const settings = resolveSettings(desired.settings, options.settings);
  const drivers =
    options.drivers ??
    createHostDrivers({
      runner: options.runner ?? systemRunner,
      settings,
      units: desired.units,
      now,
      signal: options.signal,
      onProgress: options.onProgress,
    });

  options.onPhase?.("probing");
  const drift = await detectDrift(desired.units.values(), drivers.probe);
  logDebug(`drift: ${drift.drifted.length} drifted, ${drift.unknown.length} unknown`);

  const result: ReconcileResult = {
    desired,
    settings,
    drift,
    plan: null,
    report: null,
    verification: null,
    converged: isConverged(drift),
  };
  if (options.mode === "check") {
    options.onPhase?.("done");
    return result;
  }

  options.onPhase?.("planning");
  const plan = planActions(desired, drift);
  result.plan = plan;
  if (options.mode === "plan" || plan.actions.length === 0) {
    options.onPhase?.("done");
    return result;
  }

  options.onPhase?.("applying");
  logInfo(`applying ${plan.actions.length} action(s)`);
  const report = await executePlan(plan, drivers.handler, {
    concurrency: settings.concurrency,
    rollback: settings.rollback,
    signal: options.signal,
    probeFailures: drift.entries.filter((entry) => entry.status === "unknown"),
    now,
    onStart: options.onStart,
    onOutcome: options.onOutcome,
  });
  result.report = report;

  options.onPhase?.("verifying");
  const verification = await detectDrift(desired.units.values(), drivers.probe);
  result.verification = verification;
  result.converged = reportSucceeded(report) && isConverged(verification);

  options.onPhase?.("done");
  return result;
}
