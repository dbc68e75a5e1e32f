import { describe, it, expect } from "vitest";
import { ReportBuilder, reportSucceeded } from "./report.js";
import type { Action, ActionOutcome } from "./types.js";

const FIXED_NOW = () => new Date("2026-03-01T12:00:00.000Z");

function outcome(unit: string, status: ActionOutcome["status"]): ActionOutcome {
  const action: Action = { id: unit, unit, kind: "file", operation: "configure", rank: 0, after: [], reason: "drifted" };
  return { action, status, message: status };
}

describe("ReportBuilder", () => {
  it("counts forward outcomes and successful rollbacks", () => {
    const builder = new ReportBuilder(FIXED_NOW);
    builder.record(outcome("a", "applied"));
    builder.record(outcome("b", "failed"));
    builder.record(outcome("c", "skipped"));
    builder.recordRollback(outcome("b", "rolled-back"));
    builder.recordRollback(outcome("a", "failed"));

    const report = builder.seal();
    expect(report.summary).toEqual({ applied: 1, failed: 1, skipped: 1, rolledBack: 1 });
    expect(report.startedAt).toBe("2026-03-01T12:00:00.000Z");
    expect(report.finishedAt).toBe("2026-03-01T12:00:00.000Z");
  });

  it("refuses writes after sealing", () => {
    const builder = new ReportBuilder(FIXED_NOW);
    const report = builder.seal();
    expect(() => builder.record(outcome("a", "applied"))).toThrow("Reconciliation report is sealed");
    expect(() => builder.setHeld([])).toThrow("Reconciliation report is sealed");
    expect(builder.seal()).toBe(report);
  });

  it("freezes the sealed report all the way down", () => {
    const builder = new ReportBuilder(FIXED_NOW);
    builder.record(outcome("a", "applied"));
    builder.setHeld([{ unit: "web", blockedBy: "dns" }]);
    const report = builder.seal();

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.summary)).toBe(true);
    expect(Object.isFrozen(report.outcomes[0])).toBe(true);
    expect(Object.isFrozen(report.held[0])).toBe(true);
  });

  it("copies outcomes so later changes to the inputs do not leak in", () => {
    const builder = new ReportBuilder(FIXED_NOW);
    const held = [{ unit: "web", blockedBy: "dns" }];
    builder.setHeld(held);
    held.push({ unit: "api", blockedBy: "dns" });
    expect(builder.seal().held).toEqual([{ unit: "web", blockedBy: "dns" }]);
  });
});

describe("reportSucceeded", () => {
  it("is true for an empty report", () => {
    expect(reportSucceeded(new ReportBuilder(FIXED_NOW).seal())).toBe(true);
  });

  it("is false once anything was skipped", () => {
    const builder = new ReportBuilder(FIXED_NOW);
    builder.record(outcome("a", "skipped"));
    expect(reportSucceeded(builder.seal())).toBe(false);
  });
});
