import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { CommandCancelledError } from "./errors.js";
import { formatCommand, type CommandResult, type CommandSpec, type RunOptions } from "./exec.js";
import { FIXED_NOW, FakeHost, TEST_SETTINGS, fileUnit, packageUnit, serviceUnit } from "./fake-host.test-helpers.js";
import { buildQueryCommand } from "./modules/package.js";
import { reconcile, resolveSettings, type ReconcilePhase } from "./reconciler.js";
import type { DesiredState, DesiredUnit } from "./types.js";

let tmp: string;
const ORIG_XDG = process.env.XDG_CACHE_HOME;

beforeEach(() => {
  tmp = mkdtempSync(join(tmpdir(), "converge-reconcile-"));
  process.env.XDG_CACHE_HOME = join(tmp, "cache");
});

afterEach(() => {
  if (ORIG_XDG !== undefined) {
    process.env.XDG_CACHE_HOME = ORIG_XDG;
  } else {
    delete process.env.XDG_CACHE_HOME;
  }
  rmSync(tmp, { recursive: true, force: true });
});

function desiredOf(units: DesiredUnit[]): DesiredState {
  return {
    sourcePath: "/srv/converge/host.yaml",
    settings: TEST_SETTINGS,
    units: new Map(units.map((unit): [string, DesiredUnit] => [unit.name, unit])),
  };
}

/** nginx package, its config file and its service, chained by dependencies. */
function webServer(confPath: string): DesiredState {
  return desiredOf([
    packageUnit("nginx"),
    fileUnit("nginx-conf", confPath, { content: "listen 80;\n", dependencies: ["nginx"] }),
    serviceUnit("nginx-svc", { serviceName: "nginx", dependencies: ["nginx-conf"], restartOn: ["nginx-conf"] }),
  ]);
}

/** Refuses every command once the caller's signal is aborted, like the real runner. */
class CancellableHost extends FakeHost {
  async run(command: CommandSpec, options?: RunOptions): Promise<CommandResult> {
    if (options?.signal?.aborted) throw new CommandCancelledError(formatCommand(command));
    return super.run(command, options);
  }
}

function freshHost(): FakeHost {
  const host = new FakeHost();
  host.repository.set("nginx", "1.24.0-1.el9");
  host.services.set("nginx", { enabled: "disabled", active: false });
  return host;
}

describe("resolveSettings", () => {
  it("applies only the overrides that are set", () => {
    expect(resolveSettings(TEST_SETTINGS, { concurrency: 4, rollback: false })).toEqual({
      ...TEST_SETTINGS,
      concurrency: 4,
      rollback: false,
    });
    expect(resolveSettings(TEST_SETTINGS)).toEqual(TEST_SETTINGS);
  });
});

describe("reconcile", () => {
  it("check mode reports drift and touches nothing", async () => {
    const host = freshHost();
    const phases: ReconcilePhase[] = [];
    const result = await reconcile(webServer(join(tmp, "nginx.conf")), {
      mode: "check",
      runner: host,
      now: FIXED_NOW,
      onPhase: (phase) => phases.push(phase),
    });

    expect(result.drift.drifted).toEqual(["nginx", "nginx-conf", "nginx-svc"]);
    expect(result.plan).toBeNull();
    expect(result.report).toBeNull();
    expect(result.converged).toBe(false);
    expect(phases).toEqual(["probing", "done"]);
    expect(host.mutations()).toEqual([]);
  });

  it("plan mode orders the actions along the dependencies", async () => {
    const host = freshHost();
    const result = await reconcile(webServer(join(tmp, "nginx.conf")), { mode: "plan", runner: host, now: FIXED_NOW });

    expect(result.plan?.actions.map((a) => `${a.operation} ${a.unit}`)).toEqual([
      "install nginx",
      "configure nginx-conf",
      "enable nginx-svc",
    ]);
    expect(result.report).toBeNull();
    expect(host.mutations()).toEqual([]);
    expect(existsSync(join(tmp, "nginx.conf"))).toBe(false);
  });

  it("converges the host, and a second run has nothing to do", async () => {
    const host = freshHost();
    const confPath = join(tmp, "nginx.conf");
    const desired = webServer(confPath);
    const phases: ReconcilePhase[] = [];

    const first = await reconcile(desired, {
      mode: "apply",
      runner: host,
      now: FIXED_NOW,
      onPhase: (phase) => phases.push(phase),
    });

    expect(phases).toEqual(["probing", "planning", "applying", "verifying", "done"]);
    expect(first.report?.summary).toEqual({ applied: 3, failed: 0, skipped: 0, rolledBack: 0 });
    expect(first.verification?.drifted).toEqual([]);
    expect(first.converged).toBe(true);
    expect(readFileSync(confPath, "utf-8")).toBe("listen 80;\n");
    expect(host.mutations()).toEqual(["dnf install -y nginx", "systemctl enable nginx", "systemctl start nginx"]);

    const second = await reconcile(desired, { mode: "apply", runner: host, now: FIXED_NOW });
    expect(second.plan?.actions).toEqual([]);
    expect(second.report).toBeNull();
    expect(second.converged).toBe(true);
    expect(host.mutations()).toHaveLength(3);
  });

  it("restarts a running service when only its config changed", async () => {
    const host = freshHost();
    host.packages.set("nginx", "1.24.0-1.el9");
    host.services.set("nginx", { enabled: "enabled", active: true });
    const confPath = join(tmp, "nginx.conf");
    writeFileSync(confPath, "listen 8080;\n");

    const result = await reconcile(webServer(confPath), { mode: "apply", runner: host, now: FIXED_NOW });
    expect(result.report?.outcomes.map((o) => `${o.status} ${o.action.operation} ${o.action.unit}`)).toEqual([
      "applied configure nginx-conf",
      "applied restart nginx-svc",
    ]);
    expect(host.mutations()).toEqual(["systemctl restart nginx"]);
    expect(result.converged).toBe(true);
  });

  it("enables and restarts an active service whose config changed", async () => {
    const host = freshHost();
    host.packages.set("nginx", "1.24.0-1.el9");
    host.services.set("nginx", { enabled: "disabled", active: true });
    const confPath = join(tmp, "nginx.conf");
    writeFileSync(confPath, "listen 8080;\n");

    const result = await reconcile(webServer(confPath), { mode: "apply", runner: host, now: FIXED_NOW });
    expect(result.report?.outcomes.map((o) => `${o.status} ${o.action.operation} ${o.action.unit}`)).toEqual([
      "applied configure nginx-conf",
      "applied enable nginx-svc",
    ]);
    expect(host.mutations()).toEqual(["systemctl enable nginx", "systemctl restart nginx"]);
    expect(readFileSync(confPath, "utf-8")).toBe("listen 80;\n");
    expect(result.converged).toBe(true);
  });

  it("rolls back everything applied when an action fails", async () => {
    const host = freshHost().failOn("systemctl start nginx", { exitCode: 1, stderr: "Job for nginx.service failed.\n" });
    const confPath = join(tmp, "nginx.conf");
    writeFileSync(confPath, "listen 8080;\n");

    const result = await reconcile(webServer(confPath), { mode: "apply", runner: host, now: FIXED_NOW });

    expect(result.report?.outcomes.map((o) => o.status)).toEqual(["applied", "applied", "failed"]);
    expect(result.report?.outcomes[2]?.stderr).toBe("Job for nginx.service failed.");
    expect(result.report?.rollbacks.map((o) => `${o.status} ${o.action.unit}`)).toEqual([
      "rolled-back nginx-svc",
      "rolled-back nginx-conf",
      "rolled-back nginx",
    ]);
    expect(result.report?.summary).toEqual({ applied: 2, failed: 1, skipped: 0, rolledBack: 3 });
    expect(readFileSync(confPath, "utf-8")).toBe("listen 8080;\n");
    expect(host.packages.has("nginx")).toBe(false);
    expect(host.services.get("nginx")).toEqual({ enabled: "disabled", active: false });
    expect(host.mutations()).toEqual([
      "dnf install -y nginx",
      "systemctl enable nginx",
      "systemctl start nginx",
      "systemctl disable nginx",
      "dnf remove -y nginx",
    ]);
    expect(result.converged).toBe(false);
    expect(result.verification?.drifted).toEqual(["nginx", "nginx-conf", "nginx-svc"]);
  });

  it("still rolls back applied actions after the run is cancelled", async () => {
    const host = new CancellableHost();
    host.repository.set("a", "1.0-1");
    host.repository.set("b", "1.0-1");
    const controller = new AbortController();

    const result = await reconcile(desiredOf([packageUnit("a"), packageUnit("b")]), {
      mode: "apply",
      runner: host,
      now: FIXED_NOW,
      signal: controller.signal,
      onOutcome: (outcome) => {
        if (outcome.action.unit === "a") controller.abort();
      },
    });

    expect(result.report?.outcomes.map((o) => `${o.action.unit} ${o.message}`)).toEqual([
      "a Installed a",
      "b Skipped: cancelled",
    ]);
    expect(result.report?.rollbacks.map((o) => [o.action.unit, o.status, o.message])).toEqual([
      ["a", "rolled-back", "Removed a"],
    ]);
    expect(host.packages.has("a")).toBe(false);
    expect(host.mutations()).toEqual(["dnf install -y a", "dnf remove -y a"]);
  });

  it("holds units that depend on one whose state is unknown", async () => {
    const host = freshHost().rejectOn(formatCommand(buildQueryCommand("dnf", "nginx")));
    const result = await reconcile(webServer(join(tmp, "nginx.conf")), { mode: "apply", runner: host, now: FIXED_NOW });

    expect(result.drift.unknown).toEqual(["nginx"]);
    expect(result.plan).toEqual({
      actions: [],
      held: [
        { unit: "nginx-conf", blockedBy: "nginx" },
        { unit: "nginx-svc", blockedBy: "nginx" },
      ],
    });
    expect(result.report).toBeNull();
    expect(result.converged).toBe(false);
    expect(host.mutations()).toEqual([]);
  });

  it("forwards progress and outcomes to the callbacks", async () => {
    const host = freshHost();
    const progress: string[] = [];
    const finished: string[] = [];
    await reconcile(desiredOf([packageUnit("nginx")]), {
      mode: "apply",
      runner: host,
      now: FIXED_NOW,
      onProgress: (unit, event) => progress.push(`${unit} ${event.type}`),
      onOutcome: (outcome) => finished.push(`${outcome.status} ${outcome.action.unit}`),
    });

    expect(finished).toEqual(["applied nginx"]);
    expect(progress).toContain("nginx stdout");
    expect(progress.filter((line) => line === "nginx done")).toHaveLength(host.commands.length);
  });
});
