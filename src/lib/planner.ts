import { UnsatisfiableOrderError } from "./errors.js";
import { topologicalSort } from "./graph.js";
import type {
  Action,
  DesiredState,
  DesiredUnit,
  DriftEntry,
  DriftReport,
  HeldUnit,
  Operation,
  Plan,
} from "./types.js";

function operationFor(unit: DesiredUnit): Operation {
  switch (unit.kind) {
    case "package":
      return unit.state === "present" ? "install" : "remove";
    case "file":
      return "configure";
    case "service":
      return unit.state === "running" ? "enable" : "disable";
  }
}

/**
 * The closest planned units reachable through `unit`'s dependencies,
 * walking through units that need no action.
 */
function nearestPlanned(
  unit: DesiredUnit,
  units: ReadonlyMap<string, DesiredUnit>,
  planned: ReadonlySet<string>,
): string[] {
  const found = new Set<string>();
  const seen = new Set<string>();
  const queue = [...unit.dependencies];

  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    if (planned.has(name)) {
      found.add(name);
      continue;
    }
    queue.push(...(units.get(name)?.dependencies ?? []));
  }

  return [...found].sort();
}

/** The first unknown unit `unit` depends on, directly or transitively. */
function blockingUnknown(
  unit: DesiredUnit,
  units: ReadonlyMap<string, DesiredUnit>,
  unknown: ReadonlySet<string>,
): string | null {
  const seen = new Set<string>();
  const queue = [...unit.dependencies];

  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    if (unknown.has(name)) return name;
    queue.push(...(units.get(name)?.dependencies ?? []));
  }
  return null;
}

function entryFor(drift: DriftReport, unit: string): DriftEntry | undefined {
  return drift.entries.find((entry) => entry.unit === unit);
}

/**
 * Turn drift into an ordered action list.
 *
 * One action per unit: drifted units get their kind's operation; an in-sync
 * running service gets a restart when a file in its restartOn is planned.
 * A drifted running service is ordered after such files too.
 * Actions are ordered with Kahn's algorithm, lexicographic by unit name
 * among ready actions.
 */
export function planActions(desired: Pick<DesiredState, "units">, drift: DriftReport): Plan {
  const { units } = desired;
  const unknown = new Set(drift.unknown);
  const held: HeldUnit[] = [];
  const planned = new Set<string>();

  for (const name of [...drift.drifted].sort()) {
    const unit = units.get(name);
    if (!unit) continue;
    const blocker = blockingUnknown(unit, units, unknown);
    if (blocker) {
      held.push({ unit: name, blockedBy: blocker });
      continue;
    }
    planned.add(name);
  }

  // In-sync services get a restart action; drifted ones carry their triggers.
  const restarts = new Map<string, string[]>();
  const triggered = new Map<string, string[]>();
  for (const unit of units.values()) {
    if (unit.kind !== "service" || unit.state !== "running" || unknown.has(unit.name)) continue;
    const triggers = unit.restartOn.filter((file) => planned.has(file));
    if (triggers.length === 0) continue;
    if (planned.has(unit.name)) {
      triggered.set(unit.name, triggers);
    } else if (entryFor(drift, unit.name)?.status === "in-sync") {
      restarts.set(unit.name, triggers);
    }
  }

  const actionUnits = new Set([...planned, ...restarts.keys()]);
  const prerequisites = new Map<string, string[]>();
  for (const name of actionUnits) {
    const unit = units.get(name);
    if (!unit) continue;
    const after = new Set(nearestPlanned(unit, units, actionUnits));
    for (const trigger of restarts.get(name) ?? triggered.get(name) ?? []) after.add(trigger);
    prerequisites.set(name, [...after].sort());
  }

  const { order, remaining } = topologicalSort(actionUnits, prerequisites);
  if (remaining.length > 0) {
    throw new UnsatisfiableOrderError(remaining);
  }

  const actions: Action[] = order.map((name, rank) => {
    const unit = units.get(name);
    if (!unit) throw new UnsatisfiableOrderError([name]);
    const triggers = restarts.get(name);
    const changedInputs = triggered.get(name);
    return {
      id: name,
      unit: name,
      kind: unit.kind,
      operation: triggers ? "restart" : operationFor(unit),
      rank,
      after: prerequisites.get(name) ?? [],
      reason: triggers ? `${triggers.join(", ")} changed` : (entryFor(drift, name)?.message ?? "drifted"),
      ...(changedInputs ? { triggers: changedInputs } : {}),
    };
  });

  return { actions, held };
}
