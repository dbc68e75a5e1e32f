import { describe, it, expect } from "vitest";
import {
  formatTable,
  renderDriftLog,
  renderDriftTable,
  renderPlanLog,
  renderPlanTable,
  renderReportLog,
  renderReportTable,
} from "./render.js";
import { ReportBuilder } from "./report.js";
import type { Action, DriftReport, Plan } from "./types.js";

const FIXED_NOW = () => new Date("2026-03-01T12:00:00.000Z");

function install(unit: string, rank: number): Action {
  return { id: unit, unit, kind: "package", operation: "install", rank, after: [], reason: `${unit} is not installed` };
}

function sampleReport() {
  const a = install("a", 0);
  const b = install("b", 1);
  const c = install("c", 2);
  const builder = new ReportBuilder(FIXED_NOW);
  builder.setProbeFailures([
    { unit: "dns", kind: "package", status: "unknown", message: "State could not be determined", error: "Probe failed for dns: timeout" },
  ]);
  builder.setHeld([{ unit: "web", blockedBy: "dns" }]);
  builder.record({ action: a, status: "applied", message: "installed a" });
  builder.record({ action: b, status: "failed", message: "install b failed: boom", stderr: "E: broken" });
  builder.record({ action: c, status: "skipped", message: "Skipped: an earlier action failed" });
  builder.recordRollback({
    action: { ...a, id: "a:rollback", operation: "rollback", reason: "undo install" },
    status: "rolled-back",
    message: "removed a",
  });
  return builder.seal();
}

const drift: DriftReport = {
  entries: [
    { unit: "dns", kind: "package", status: "unknown", message: "State could not be determined", error: "Probe failed for dns: timeout" },
    { unit: "motd", kind: "file", status: "drifted", message: "/etc/motd content differs" },
  ],
  drifted: ["motd"],
  unknown: ["dns"],
};

describe("formatTable", () => {
  it("pads every column but the last to its widest cell", () => {
    expect(formatTable(["A", "B"], [["long", "x"], ["s", "yy"]])).toBe("A     B\nlong  x\ns     yy");
  });
});

describe("report rendering", () => {
  it("renders the human log", () => {
    expect(renderReportLog(sampleReport())).toEqual([
      "[unknown] dns: Probe failed for dns: timeout",
      "[held] web: depends on dns",
      "[applied] install a: installed a",
      "[failed] install b: install b failed: boom",
      "    E: broken",
      "[skipped] install c: Skipped: an earlier action failed",
      "Rollback:",
      "[rolled-back] rollback a: removed a",
      "applied 1, failed 1, skipped 1, rolled back 1",
    ]);
  });

  it("renders the table", () => {
    expect(renderReportTable(sampleReport()).split("\n")).toEqual([
      "RANK  UNIT  KIND     OPERATION  OUTCOME      DETAIL",
      "1     a     package  install    applied      installed a",
      "2     b     package  install    failed       install b failed: boom",
      "3     c     package  install    skipped      Skipped: an earlier action failed",
      "-     a     package  rollback   rolled-back  removed a",
    ]);
  });
});

describe("drift rendering", () => {
  it("renders one log line per unit", () => {
    expect(renderDriftLog(drift)).toEqual([
      "[unknown] dns (package): Probe failed for dns: timeout",
      "[drifted] motd (file): /etc/motd content differs",
    ]);
  });

  it("renders the table", () => {
    expect(renderDriftTable(drift).split("\n")).toEqual([
      "UNIT  KIND     STATUS   DETAIL",
      "dns   package  unknown  Probe failed for dns: timeout",
      "motd  file     drifted  /etc/motd content differs",
    ]);
  });
});

describe("plan rendering", () => {
  const plan: Plan = {
    actions: [
      install("base", 0),
      {
        id: "app-config",
        unit: "app-config",
        kind: "file",
        operation: "configure",
        rank: 1,
        after: ["base"],
        reason: "/etc/app.conf does not exist",
      },
    ],
    held: [{ unit: "web", blockedBy: "dns" }],
  };

  it("renders numbered actions and held units", () => {
    expect(renderPlanLog(plan)).toEqual([
      "1. install base (package): base is not installed",
      "2. configure app-config (file): /etc/app.conf does not exist",
      "held web: depends on dns, whose state is unknown",
    ]);
  });

  it("says so when there is nothing to do", () => {
    expect(renderPlanLog({ actions: [], held: [] })).toEqual(["Nothing to do: host matches the desired state."]);
  });

  it("renders the table", () => {
    expect(renderPlanTable({ ...plan, held: [] }).split("\n")).toEqual([
      "RANK  UNIT        KIND     OPERATION  AFTER  REASON",
      "1     base        package  install    -      base is not installed",
      "2     app-config  file     configure  base   /etc/app.conf does not exist",
    ]);
  });
});
