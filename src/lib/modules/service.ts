import { ProbeFailureError } from "../errors.js";
import type { CommandResult, CommandSpec } from "../exec.js";
import type { Action, ApplyResult, CheckResult, ServiceUnit } from "../types.js";
import { runProbe, runStep } from "./command.js";
import type { ModuleContext, ServiceSnapshot, UnitModule } from "./types.js";

export type SystemctlVerb =
  | "is-enabled"
  | "is-active"
  | "enable"
  | "disable"
  | "start"
  | "stop"
  | "restart";

export function buildSystemctlCommand(verb: SystemctlVerb, service: string): CommandSpec {
  return { cmd: "systemctl", args: [verb, service] };
}

// `static`, `indirect` and `generated` units cannot be toggled; they satisfy either wish.
const ENABLED_STATES = new Set(["enabled", "enabled-runtime", "alias"]);
const FIXED_STATES = new Set(["static", "indirect", "generated", "transient"]);
const MISSING_PATTERN = /no such file|not found|does not exist|could not be found/i;

export interface ServiceStatus {
  exists: boolean;
  enablement: "enabled" | "disabled" | "fixed";
  enabledState: string;
  active: boolean;
  activeState: string;
}

export function parseEnablement(result: CommandResult): { exists: boolean; state: string } | null {
  const state = result.stdout.trim();
  if (state === "not-found") return { exists: false, state };
  if (state) return { exists: true, state };
  if (MISSING_PATTERN.test(result.stderr)) return { exists: false, state: "not-found" };
  return null;
}

export async function queryService(
  unitName: string,
  service: string,
  ctx: ModuleContext,
): Promise<ServiceStatus> {
  const enabledResult = await runProbe(ctx, unitName, buildSystemctlCommand("is-enabled", service));
  const enablement = parseEnablement(enabledResult);
  if (!enablement) {
    throw new ProbeFailureError(unitName, enabledResult.stderr.trim() || `is-enabled exited with ${enabledResult.exitCode}`);
  }

  const activeResult = await runProbe(ctx, unitName, buildSystemctlCommand("is-active", service));
  const activeState = activeResult.stdout.trim();
  if (!activeState) {
    throw new ProbeFailureError(unitName, activeResult.stderr.trim() || `is-active exited with ${activeResult.exitCode}`);
  }

  let kind: ServiceStatus["enablement"] = "disabled";
  if (ENABLED_STATES.has(enablement.state)) kind = "enabled";
  else if (FIXED_STATES.has(enablement.state)) kind = "fixed";

  return {
    exists: enablement.exists,
    enablement: kind,
    enabledState: enablement.state,
    active: activeState === "active",
    activeState,
  };
}

function enablementMatches(unit: ServiceUnit, status: Pick<ServiceStatus, "enablement">): boolean {
  if (status.enablement === "fixed") return true;
  return (status.enablement === "enabled") === unit.enabled;
}

/** systemctl steps that take `current` to the unit's desired state, in execution order. */
export function planServiceSteps(
  unit: ServiceUnit,
  current: { enabled: boolean; active: boolean; fixed?: boolean },
): CommandSpec[] {
  const steps: CommandSpec[] = [];
  const wantActive = unit.state === "running";

  if (!current.fixed && unit.enabled !== current.enabled) {
    steps.push(buildSystemctlCommand(unit.enabled ? "enable" : "disable", unit.serviceName));
  }
  if (wantActive !== current.active) {
    steps.push(buildSystemctlCommand(wantActive ? "start" : "stop", unit.serviceName));
  }
  return steps;
}

function describeStatus(status: ServiceStatus): string {
  return `${status.enabledState}/${status.activeState}`;
}

export const serviceModule: UnitModule<ServiceUnit, ServiceSnapshot> = {
  kind: "service",

  async check(unit, ctx): Promise<CheckResult> {
    const status = await queryService(unit.name, unit.serviceName, ctx);
    const observed = {
      unit: unit.name,
      present: status.exists,
      fingerprint: describeStatus(status),
      checkedAt: ctx.now().toISOString(),
      detail: { service: unit.serviceName, enabled: status.enabledState, active: status.activeState },
    };

    if (!status.exists) {
      if (unit.state === "stopped" && !unit.enabled) {
        return { status: "in-sync", message: `${unit.serviceName} is not installed`, observed };
      }
      return { status: "missing", message: `${unit.serviceName} unit not found`, observed };
    }

    const problems: string[] = [];
    if (!enablementMatches(unit, status)) {
      problems.push(`${status.enabledState}, wanted ${unit.enabled ? "enabled" : "disabled"}`);
    }
    if ((unit.state === "running") !== status.active) {
      problems.push(`${status.activeState}, wanted ${unit.state}`);
    }

    if (problems.length > 0) {
      return { status: "drifted", message: `${unit.serviceName}: ${problems.join("; ")}`, observed };
    }
    return { status: "in-sync", message: `${unit.serviceName} ${describeStatus(status)}`, observed };
  },

  async snapshot(unit, ctx): Promise<ServiceSnapshot> {
    const status = await queryService(unit.name, unit.serviceName, ctx);
    return {
      kind: "service",
      exists: status.exists,
      enabled: status.enablement !== "disabled",
      fixed: status.enablement === "fixed",
      active: status.active,
    };
  },

  async apply(action, unit, snapshot, ctx): Promise<ApplyResult> {
    if (action.operation === "restart") {
      await runStep(ctx, action, buildSystemctlCommand("restart", unit.serviceName));
      return { changed: true, message: `Restarted ${unit.serviceName}` };
    }

    const steps = planServiceSteps(unit, snapshot);
    // Already running on the old configuration.
    if (action.triggers?.length && unit.state === "running" && snapshot.active) {
      steps.push(buildSystemctlCommand("restart", unit.serviceName));
    }
    if (steps.length === 0) {
      return { changed: false, message: `${unit.serviceName} already ${unit.state}` };
    }
    for (const step of steps) {
      await runStep(ctx, action, step);
    }
    return { changed: true, message: steps.map((s) => `${s.args[0]} ${unit.serviceName}`).join(", ") };
  },

  async rollback(action: Action, unit, snapshot, ctx): Promise<ApplyResult> {
    if (action.operation === "restart") {
      return { changed: false, message: "A restart has nothing to undo" };
    }
    if (!snapshot.exists) {
      return { changed: false, message: `${unit.serviceName} did not exist before` };
    }

    const previous: ServiceUnit = {
      ...unit,
      enabled: snapshot.enabled,
      state: snapshot.active ? "running" : "stopped",
    };
    const status = await queryService(unit.name, unit.serviceName, ctx);
    const steps = planServiceSteps(previous, {
      enabled: status.enablement !== "disabled",
      active: status.active,
      fixed: status.enablement === "fixed",
    });
    // Undo in the reverse order of the forward steps.
    for (const step of steps.reverse()) {
      await runStep(ctx, action, step);
    }
    return {
      changed: steps.length > 0,
      message: steps.length > 0 ? `Restored ${unit.serviceName} to ${previous.enabled ? "enabled" : "disabled"}/${previous.state}` : `${unit.serviceName} unchanged`,
    };
  },
};
