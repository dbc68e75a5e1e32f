import { ProbeFailureError } from "./errors.js";
import type { CheckResult, DesiredUnit, DriftEntry, DriftReport } from "./types.js";

/** Read-only query of one unit's observed state. Throws ProbeFailureError when the host cannot be asked. */
export type UnitProbe = (unit: DesiredUnit) => Promise<CheckResult>;

function toEntry(unit: DesiredUnit, check: CheckResult): DriftEntry {
  const entry: DriftEntry = {
    unit: unit.name,
    kind: unit.kind,
    status: check.status,
    message: check.message,
    observed: check.observed,
  };
  if (check.diff !== undefined) entry.diff = check.diff;
  if (check.driftKind !== undefined) entry.driftKind = check.driftKind;
  return entry;
}

/**
 * Probe every unit, in name order, and classify it.
 * Never mutates the host; a probe failure degrades that unit to "unknown".
 */
export async function detectDrift(units: Iterable<DesiredUnit>, probe: UnitProbe): Promise<DriftReport> {
  const sorted = [...units].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const entries: DriftEntry[] = [];

  for (const unit of sorted) {
    try {
      entries.push(toEntry(unit, await probe(unit)));
    } catch (error) {
      if (!(error instanceof ProbeFailureError)) throw error;
      entries.push({
        unit: unit.name,
        kind: unit.kind,
        status: "unknown",
        message: "State could not be determined",
        error: error.message,
      });
    }
  }

  return {
    entries,
    drifted: entries.filter((e) => e.status === "drifted" || e.status === "missing").map((e) => e.unit),
    unknown: entries.filter((e) => e.status === "unknown").map((e) => e.unit),
  };
}

export function isConverged(report: DriftReport): boolean {
  return report.drifted.length === 0 && report.unknown.length === 0;
}
