import type { UnitProbe } from "../drift.js";
import type { ActionHandler } from "../executor.js";
import type { Action, ApplyResult, DesiredUnit } from "../types.js";
import { fileModule } from "./file.js";
import { packageModule } from "./package.js";
import { serviceModule } from "./service.js";
import type { ModuleContext, UnitSnapshot } from "./types.js";

export { fileModule } from "./file.js";
export { packageModule } from "./package.js";
export { serviceModule } from "./service.js";
export type { ModuleContext, UnitModule, UnitSnapshot } from "./types.js";

export interface HostDrivers {
  probe: UnitProbe;
  handler: ActionHandler<UnitSnapshot>;
}

function mismatch(unit: DesiredUnit, snapshot: UnitSnapshot): Error {
  return new Error(`Snapshot for ${unit.name} is a ${snapshot.kind} snapshot, expected ${unit.kind}`);
}

/** Probe and action handler that act on the host through the unit modules. */
export function createHostDrivers(ctx: ModuleContext): HostDrivers {
  const unitFor = (action: Action): DesiredUnit => {
    const unit = ctx.units.get(action.unit);
    if (!unit) throw new Error(`Unknown unit: ${action.unit}`);
    return unit;
  };

  // Rollback runs after a cancellation too, so it must not inherit the run's signal.
  const rollbackCtx: ModuleContext = { ...ctx, signal: undefined };

  const dispatch = (action: Action, snapshot: UnitSnapshot, step: "apply" | "rollback"): Promise<ApplyResult> => {
    const unit = unitFor(action);
    const stepCtx = step === "rollback" ? rollbackCtx : ctx;
    switch (unit.kind) {
      case "package":
        if (snapshot.kind !== "package") throw mismatch(unit, snapshot);
        return packageModule[step](action, unit, snapshot, stepCtx);
      case "service":
        if (snapshot.kind !== "service") throw mismatch(unit, snapshot);
        return serviceModule[step](action, unit, snapshot, stepCtx);
      case "file":
        if (snapshot.kind !== "file") throw mismatch(unit, snapshot);
        return fileModule[step](action, unit, snapshot, stepCtx);
    }
  };

  return {
    probe: (unit) => {
      switch (unit.kind) {
        case "package":
          return packageModule.check(unit, ctx);
        case "service":
          return serviceModule.check(unit, ctx);
        case "file":
          return fileModule.check(unit, ctx);
      }
    },
    handler: {
      snapshot: async (action): Promise<UnitSnapshot> => {
        const unit = unitFor(action);
        switch (unit.kind) {
          case "package":
            return packageModule.snapshot(unit, ctx);
          case "service":
            return serviceModule.snapshot(unit, ctx);
          case "file":
            return fileModule.snapshot(unit, ctx);
        }
      },
      apply: (action, snapshot) => dispatch(action, snapshot, "apply"),
      rollback: (action, snapshot) => dispatch(action, snapshot, "rollback"),
    },
  };
}
