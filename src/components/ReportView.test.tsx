import React from "react";
import { describe, it, expect } from "vitest";
import { render } from "ink-testing-library";
import { ReportBuilder } from "../lib/report.js";
import type { Action } from "../lib/types.js";
import { ReportView } from "./ReportView.js";

const install: Action = {
  id: "nginx",
  unit: "nginx",
  kind: "package",
  operation: "install",
  rank: 0,
  after: [],
  reason: "nginx is not installed",
};

const enable: Action = {
  id: "nginx-svc",
  unit: "nginx-svc",
  kind: "service",
  operation: "enable",
  rank: 1,
  after: ["nginx"],
  reason: "disabled",
};

describe("ReportView", () => {
  it("shows applied outcomes and the summary", () => {
    const builder = new ReportBuilder();
    builder.record({ action: install, status: "applied", message: "Installed nginx" });
    const { lastFrame } = render(<ReportView report={builder.seal()} />);

    const frame = lastFrame() ?? "";
    expect(frame).toContain("applied");
    expect(frame).toContain("install nginx · Installed nginx");
    expect(frame).toContain("applied 1, failed 0, skipped 0, rolled back 0");
    expect(frame).not.toContain("Rollback");
  });

  it("shows stderr of a failure and the rollback section", () => {
    const builder = new ReportBuilder();
    builder.record({ action: install, status: "applied", message: "Installed nginx" });
    builder.record({
      action: enable,
      status: "failed",
      message: "enable nginx-svc failed",
      stderr: "Job for nginx.service failed.",
    });
    builder.recordRollback({
      action: { ...install, id: "nginx:rollback", operation: "rollback" },
      status: "rolled-back",
      message: "Removed nginx",
    });
    const { lastFrame } = render(<ReportView report={builder.seal()} />);

    const frame = lastFrame() ?? "";
    expect(frame).toContain("Job for nginx.service failed.");
    expect(frame).toContain("Rollback");
    expect(frame).toContain("rollback nginx · Removed nginx");
    expect(frame).toContain("applied 1, failed 1, skipped 0, rolled back 1");
  });

  it("lists units whose state could not be determined", () => {
    const builder = new ReportBuilder();
    builder.setProbeFailures([
      {
        unit: "vim",
        kind: "package",
        status: "unknown",
        message: "State could not be determined",
        error: "Probe failed for vim: rpmdb locked",
      },
    ]);
    const { lastFrame } = render(<ReportView report={builder.seal()} />);
    expect(lastFrame()).toContain("unknown vim · Probe failed for vim: rpmdb locked");
  });
});
