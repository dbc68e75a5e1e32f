import type {
  ActionOutcome,
  DriftReport,
  Plan,
  ReconciliationReport,
} from "./types.js";

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? "").length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join("  ")
      .trimEnd();
  return [line(headers), ...rows.map(line)].join("\n");
}

export function renderDriftTable(drift: DriftReport): string {
  return formatTable(
    ["UNIT", "KIND", "STATUS", "DETAIL"],
    drift.entries.map((entry) => [entry.unit, entry.kind, entry.status, entry.error ?? entry.message]),
  );
}

export function renderPlanTable(plan: Plan): string {
  return formatTable(
    ["RANK", "UNIT", "KIND", "OPERATION", "AFTER", "REASON"],
    plan.actions.map((action) => [
      String(action.rank + 1),
      action.unit,
      action.kind,
      action.operation,
      action.after.join(",") || "-",
      action.reason,
    ]),
  );
}

export function renderReportTable(report: ReconciliationReport): string {
  const rows = [...report.outcomes, ...report.rollbacks].map((outcome) => [
    outcome.action.operation === "rollback" ? "-" : String(outcome.action.rank + 1),
    outcome.action.unit,
    outcome.action.kind,
    outcome.action.operation,
    outcome.status,
    outcome.message,
  ]);
  return formatTable(["RANK", "UNIT", "KIND", "OPERATION", "OUTCOME", "DETAIL"], rows);
}

// ─────────────────────────────────────────────────────────────────────────────
// Human log
// ─────────────────────────────────────────────────────────────────────────────

export function renderDriftLog(drift: DriftReport): string[] {
  return drift.entries.map((entry) => {
    const detail = entry.error ?? entry.message;
    return `[${entry.status}] ${entry.unit} (${entry.kind}): ${detail}`;
  });
}

export function renderPlanLog(plan: Plan): string[] {
  if (plan.actions.length === 0 && plan.held.length === 0) {
    return ["Nothing to do: host matches the desired state."];
  }
  const lines = plan.actions.map(
    (action) => `${action.rank + 1}. ${action.operation} ${action.unit} (${action.kind}): ${action.reason}`,
  );
  for (const held of plan.held) {
    lines.push(`held ${held.unit}: depends on ${held.blockedBy}, whose state is unknown`);
  }
  return lines;
}

function outcomeLines(outcome: ActionOutcome): string[] {
  const lines = [`[${outcome.status}] ${outcome.action.operation} ${outcome.action.unit}: ${outcome.message}`];
  if (outcome.stderr) {
    for (const line of outcome.stderr.split("\n")) {
      lines.push(`    ${line}`);
    }
  }
  return lines;
}

export function summarize(report: ReconciliationReport): string {
  const { applied, failed, skipped, rolledBack } = report.summary;
  return `applied ${applied}, failed ${failed}, skipped ${skipped}, rolled back ${rolledBack}`;
}

export function renderReportLog(report: ReconciliationReport): string[] {
  const lines: string[] = [];
  for (const entry of report.probeFailures) {
    lines.push(`[unknown] ${entry.unit}: ${entry.error ?? entry.message}`);
  }
  for (const held of report.held) {
    lines.push(`[held] ${held.unit}: depends on ${held.blockedBy}`);
  }
  for (const outcome of report.outcomes) {
    lines.push(...outcomeLines(outcome));
  }
  if (report.rollbacks.length > 0) {
    lines.push("Rollback:");
    for (const outcome of report.rollbacks) {
      lines.push(...outcomeLines(outcome));
    }
  }
  lines.push(summarize(report));
  return lines;
}
