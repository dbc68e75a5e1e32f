import type {
  ActionOutcome,
  DriftEntry,
  HeldUnit,
  ReconciliationReport,
} from "./types.js";

/**
 * Accumulates outcomes during a run. seal() freezes the result; the builder
 * refuses further writes afterwards.
 */
export class ReportBuilder {
  private readonly startedAt: string;
  private readonly outcomes: ActionOutcome[] = [];
  private readonly rollbacks: ActionOutcome[] = [];
  private probeFailures: DriftEntry[] = [];
  private held: HeldUnit[] = [];
  private sealed: ReconciliationReport | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = now().toISOString();
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error("Reconciliation report is sealed");
    }
  }

  record(outcome: ActionOutcome): void {
    this.assertOpen();
    this.outcomes.push(outcome);
  }

  recordRollback(outcome: ActionOutcome): void {
    this.assertOpen();
    this.rollbacks.push(outcome);
  }

  setProbeFailures(entries: readonly DriftEntry[]): void {
    this.assertOpen();
    this.probeFailures = [...entries];
  }

  setHeld(held: readonly HeldUnit[]): void {
    this.assertOpen();
    this.held = [...held];
  }

  seal(): ReconciliationReport {
    if (this.sealed) return this.sealed;

    const count = (status: ActionOutcome["status"]) => this.outcomes.filter((o) => o.status === status).length;
    const report: ReconciliationReport = {
      startedAt: this.startedAt,
      finishedAt: this.now().toISOString(),
      outcomes: Object.freeze(this.outcomes.map((o) => Object.freeze({ ...o }))),
      rollbacks: Object.freeze(this.rollbacks.map((o) => Object.freeze({ ...o }))),
      probeFailures: Object.freeze(this.probeFailures.map((e) => Object.freeze({ ...e }))),
      held: Object.freeze(this.held.map((h) => Object.freeze({ ...h }))),
      summary: Object.freeze({
        applied: count("applied"),
        failed: count("failed"),
        skipped: count("skipped"),
        rolledBack: this.rollbacks.filter((o) => o.status === "rolled-back").length,
      }),
    };
    this.sealed = Object.freeze(report);
    return this.sealed;
  }
}

export function reportSucceeded(report: ReconciliationReport): boolean {
  return report.summary.failed === 0 && report.outcomes.every((o) => o.status === "applied");
}
