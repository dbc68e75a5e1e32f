import { ActionFailureError, errorMessage } from "./errors.js";
import { logDebug } from "./log.js";
import { ReportBuilder } from "./report.js";
import type {
  Action,
  ActionOutcome,
  ApplyResult,
  DriftEntry,
  Plan,
  ReconciliationReport,
} from "./types.js";

/**
 * Carries out actions against the host. `snapshot` captures what rollback
 * needs and runs immediately before `apply`.
 */
export interface ActionHandler<S> {
  snapshot(action: Action): Promise<S>;
  apply(action: Action, snapshot: S): Promise<ApplyResult>;
  rollback(action: Action, snapshot: S): Promise<ApplyResult>;
}

export interface ExecuteOptions {
  /** Actions run at once; 1 runs strictly in plan order. */
  concurrency?: number;
  rollback?: boolean;
  signal?: AbortSignal;
  probeFailures?: readonly DriftEntry[];
  now?: () => Date;
  onOutcome?: (outcome: ActionOutcome) => void;
  onStart?: (action: Action) => void;
}

interface Completed<S> {
  action: Action;
  snapshot: S;
}

function failureDetail(error: unknown): { message: string; stderr?: string } {
  if (error instanceof ActionFailureError && error.stderr) {
    return { message: error.message, stderr: error.stderr };
  }
  return { message: errorMessage(error) };
}

class PlanRun<S> {
  private readonly report: ReportBuilder;
  private readonly now: () => Date;
  /** Applied actions (and the failed ones that got as far as a snapshot), in completion order. */
  private readonly touched: Completed<S>[] = [];
  private readonly outcomes = new Map<string, ActionOutcome>();
  private failed = false;

  constructor(
    private readonly plan: Plan,
    private readonly handler: ActionHandler<S>,
    private readonly options: ExecuteOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.report = new ReportBuilder(this.now);
    this.report.setHeld(plan.held);
    this.report.setProbeFailures(options.probeFailures ?? []);
  }

  private halted(): boolean {
    return this.failed || Boolean(this.options.signal?.aborted);
  }

  private record(outcome: ActionOutcome): void {
    this.outcomes.set(outcome.action.id, outcome);
    this.options.onOutcome?.(outcome);
  }

  private async runOne(action: Action): Promise<boolean> {
    const startedAt = this.now().toISOString();
    this.options.onStart?.(action);
    logDebug(`${action.operation} ${action.unit}`);

    let snapshot: S;
    try {
      snapshot = await this.handler.snapshot(action);
    } catch (error) {
      this.failed = true;
      this.record({ action, status: "failed", ...failureDetail(error), startedAt, finishedAt: this.now().toISOString() });
      return false;
    }

    try {
      const result = await this.handler.apply(action, snapshot);
      this.touched.push({ action, snapshot });
      this.record({ action, status: "applied", message: result.message, startedAt, finishedAt: this.now().toISOString() });
      return true;
    } catch (error) {
      this.failed = true;
      this.touched.push({ action, snapshot });
      this.record({ action, status: "failed", ...failureDetail(error), startedAt, finishedAt: this.now().toISOString() });
      return false;
    }
  }

  private async runSequential(): Promise<void> {
    for (const action of this.plan.actions) {
      if (this.halted()) break;
      await this.runOne(action);
    }
  }

  /**
   * Bounded pool: an action starts only once every action in its `after`
   * set has been applied. After a failure or abort nothing new starts.
   */
  private async runPool(limit: number): Promise<void> {
    const pending = new Set(this.plan.actions.map((a) => a.id));
    const inFlight = new Map<string, Promise<void>>();

    const isReady = (action: Action) =>
      action.after.every((id) => this.outcomes.get(id)?.status === "applied");

    for (;;) {
      if (!this.halted()) {
        for (const action of this.plan.actions) {
          if (inFlight.size >= limit) break;
          if (!pending.has(action.id) || !isReady(action)) continue;
          pending.delete(action.id);
          inFlight.set(
            action.id,
            this.runOne(action).then(() => {
              inFlight.delete(action.id);
            }),
          );
        }
      }
      if (inFlight.size === 0) break;
      await Promise.race(inFlight.values());
    }
  }

  private async rollback(): Promise<void> {
    for (const { action, snapshot } of [...this.touched].reverse()) {
      const rollbackAction: Action = {
        ...action,
        id: `${action.id}:rollback`,
        operation: "rollback",
        reason: `undo ${action.operation}`,
      };
      const startedAt = this.now().toISOString();
      try {
        const result = await this.handler.rollback(action, snapshot);
        this.report.recordRollback({
          action: rollbackAction,
          status: "rolled-back",
          message: result.message,
          startedAt,
          finishedAt: this.now().toISOString(),
        });
      } catch (error) {
        // Best effort: keep unwinding the remaining actions.
        this.report.recordRollback({
          action: rollbackAction,
          status: "failed",
          ...failureDetail(error),
          startedAt,
          finishedAt: this.now().toISOString(),
        });
      }
    }
  }

  async execute(): Promise<ReconciliationReport> {
    const limit = Math.max(1, this.options.concurrency ?? 1);
    if (limit === 1) {
      await this.runSequential();
    } else {
      await this.runPool(limit);
    }

    const skipReason = this.options.signal?.aborted ? "cancelled" : "an earlier action failed";
    for (const action of this.plan.actions) {
      const outcome: ActionOutcome = this.outcomes.get(action.id) ?? {
        action,
        status: "skipped",
        message: `Skipped: ${skipReason}`,
      };
      this.report.record(outcome);
    }

    if (this.halted() && this.options.rollback !== false) {
      await this.rollback();
    }

    return this.report.seal();
  }
}

/**
 * Apply a plan. Action failures never escape: they are recorded, forward
 * progress stops, and the actions already carried out are rolled back in
 * reverse order.
 */
export async function executePlan<S>(
  plan: Plan,
  handler: ActionHandler<S>,
  options: ExecuteOptions = {},
): Promise<ReconciliationReport> {
  return new PlanRun(plan, handler, options).execute();
}
