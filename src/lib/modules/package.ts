import { ActionFailureError, ProbeFailureError } from "../errors.js";
import type { CommandResult, CommandSpec } from "../exec.js";
import type { Action, ApplyResult, CheckResult, PackageManager, PackageUnit } from "../types.js";
import { runProbe, runStep } from "./command.js";
import type { ModuleContext, PackageSnapshot, UnitModule } from "./types.js";

const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" };

export function buildQueryCommand(pm: PackageManager, pkg: string): CommandSpec {
  if (pm === "apt") return { cmd: "dpkg-query", args: ["-W", "-f=${Status}|${Version}", pkg] };
  return { cmd: "rpm", args: ["-q", "--queryformat", "%{VERSION}-%{RELEASE}\\n", pkg] };
}

function packageSpec(pm: PackageManager, pkg: string, version?: string | null): string {
  if (!version) return pkg;
  return pm === "apt" ? `${pkg}=${version}` : `${pkg}-${version}`;
}

export function buildInstallCommand(pm: PackageManager, pkg: string, version?: string | null): CommandSpec {
  const spec = packageSpec(pm, pkg, version);
  if (pm === "apt") return { cmd: "apt-get", args: ["install", "-y", "--allow-downgrades", spec], env: APT_ENV };
  return { cmd: pm, args: ["install", "-y", spec] };
}

export function buildRemoveCommand(pm: PackageManager, pkg: string): CommandSpec {
  if (pm === "apt") return { cmd: "apt-get", args: ["remove", "-y", pkg], env: APT_ENV };
  return { cmd: pm, args: ["remove", "-y", pkg] };
}

export interface PackageQuery {
  present: boolean;
  version: string | null;
}

/** Null when the output is not one the query command produces for a known or unknown package. */
export function parseQueryResult(pm: PackageManager, result: CommandResult): PackageQuery | null {
  if (pm === "apt") {
    if (result.exitCode === 1) return { present: false, version: null };
    if (result.exitCode !== 0) return null;
    const [status = "", version = ""] = result.stdout.trim().split("|");
    if (!status.endsWith(" installed")) return { present: false, version: null };
    return { present: true, version: version || null };
  }

  if (result.exitCode === 0) {
    const first = result.stdout.trim().split("\n")[0]?.trim() ?? "";
    return { present: true, version: first || null };
  }
  if (result.exitCode === 1 && /is not installed/.test(result.stdout + result.stderr)) {
    return { present: false, version: null };
  }
  return null;
}

/** `2.4.1` matches an installed `2.4.1` or `2.4.1-3.el9`. */
export function versionMatches(wanted: string, installed: string | null): boolean {
  if (!installed) return false;
  return installed === wanted || installed.startsWith(`${wanted}-`);
}

async function queryPackage(unit: PackageUnit, ctx: ModuleContext): Promise<PackageQuery> {
  const pm = ctx.settings.packageManager;
  const result = await runProbe(ctx, unit.name, buildQueryCommand(pm, unit.packageName));
  const query = parseQueryResult(pm, result);
  if (!query) {
    const detail = result.stderr.trim() || result.stdout.trim() || `exit ${result.exitCode}`;
    throw new ProbeFailureError(unit.name, detail);
  }
  return query;
}

export const packageModule: UnitModule<PackageUnit, PackageSnapshot> = {
  kind: "package",

  async check(unit, ctx): Promise<CheckResult> {
    const query = await queryPackage(unit, ctx);
    const observed = {
      unit: unit.name,
      present: query.present,
      fingerprint: query.version,
      checkedAt: ctx.now().toISOString(),
      detail: { package: unit.packageName },
    };

    if (unit.state === "absent") {
      return query.present
        ? { status: "drifted", message: `${unit.packageName} is installed`, observed }
        : { status: "in-sync", message: `${unit.packageName} is absent`, observed };
    }

    if (!query.present) {
      return { status: "missing", message: `${unit.packageName} is not installed`, observed };
    }
    if (unit.version && !versionMatches(unit.version, query.version)) {
      return {
        status: "drifted",
        message: `${unit.packageName} ${query.version ?? "unknown"} installed, ${unit.version} wanted`,
        observed,
      };
    }
    return { status: "in-sync", message: `${unit.packageName} ${query.version ?? ""}`.trim(), observed };
  },

  async snapshot(unit, ctx): Promise<PackageSnapshot> {
    const query = await queryPackage(unit, ctx);
    return { kind: "package", present: query.present, version: query.version };
  },

  async apply(action, unit, _snapshot, ctx): Promise<ApplyResult> {
    const pm = ctx.settings.packageManager;
    if (action.operation === "remove") {
      await runStep(ctx, action, buildRemoveCommand(pm, unit.packageName));
      return { changed: true, message: `Removed ${unit.packageName}` };
    }
    await runStep(ctx, action, buildInstallCommand(pm, unit.packageName, unit.version));
    return { changed: true, message: `Installed ${packageSpec(pm, unit.packageName, unit.version)}` };
  },

  async rollback(action: Action, unit, snapshot, ctx): Promise<ApplyResult> {
    const pm = ctx.settings.packageManager;

    if (action.operation === "remove") {
      if (!snapshot.present) {
        return { changed: false, message: `${unit.packageName} was not installed before` };
      }
      await runStep(ctx, action, buildInstallCommand(pm, unit.packageName, snapshot.version));
      return { changed: true, message: `Reinstalled ${packageSpec(pm, unit.packageName, snapshot.version)}` };
    }

    const current = await queryPackage(unit, ctx);
    if (!snapshot.present) {
      if (!current.present) {
        return { changed: false, message: `${unit.packageName} was not installed` };
      }
      await runStep(ctx, action, buildRemoveCommand(pm, unit.packageName));
      return { changed: true, message: `Removed ${unit.packageName}` };
    }

    if (current.version === snapshot.version) {
      return { changed: false, message: `${unit.packageName} still at ${snapshot.version ?? "its previous version"}` };
    }
    if (pm === "apt" && snapshot.version) {
      await runStep(ctx, action, buildInstallCommand(pm, unit.packageName, snapshot.version));
      return { changed: true, message: `Restored ${packageSpec(pm, unit.packageName, snapshot.version)}` };
    }

    throw new ActionFailureError(
      action,
      `previous version ${snapshot.version ?? "unknown"} of ${unit.packageName} must be restored by hand`,
    );
  },
};
