import { chmodSync, existsSync, readFileSync, rmSync } from "fs";
import { createTwoFilesPatch } from "diff";
import { ActionFailureError, ProbeFailureError, errorMessage } from "../errors.js";
import { atomicWriteFileSync } from "../fs-utils.js";
import { logError, logWarn } from "../log.js";
import { buildStateKey, classifyFileDrift, clearEntry, recordApplied } from "../state.js";
import type { Action, ApplyResult, CheckResult, FileDriftKind, FileUnit, ObservedState } from "../types.js";
import { createBackup, pruneBackups, restoreBackup } from "./backup.js";
import { runStep } from "./command.js";
import { fingerprintFile, hashBuffer, type FileFingerprint } from "./hash.js";
import { buildSystemctlCommand, queryService } from "./service.js";
import type { FileSnapshot, ModuleContext, UnitModule } from "./types.js";

export function formatMode(mode: number): string {
  return `0${mode.toString(8).padStart(3, "0")}`;
}

export function readDesiredContent(unit: FileUnit): Buffer {
  if (unit.content !== undefined) return Buffer.from(unit.content, "utf-8");
  if (unit.sourcePath) return readFileSync(unit.sourcePath);
  return Buffer.alloc(0);
}

function isText(buffer: Buffer): boolean {
  return !buffer.subarray(0, 8192).includes(0);
}

function buildDiff(path: string, current: Buffer, desired: Buffer): string | undefined {
  if (!isText(current) || !isText(desired)) return undefined;
  return createTwoFilesPatch(`${path} (host)`, `${path} (desired)`, current.toString("utf-8"), desired.toString("utf-8"), "", "", {
    context: 3,
  });
}

const DRIFT_NOTES: Partial<Record<FileDriftKind, string>> = {
  "host-changed": " (edited on host since last apply)",
  "both-changed": " (edited on host and in desired state since last apply)",
};

function inspect(unit: FileUnit): FileFingerprint | null {
  try {
    return fingerprintFile(unit.path);
  } catch (error) {
    throw new ProbeFailureError(unit.name, errorMessage(error), error);
  }
}

/** Stop the unit's `pause` services that are running; returns the ones stopped. */
async function pauseServices(action: Action, unit: FileUnit, ctx: ModuleContext): Promise<string[]> {
  const stopped: string[] = [];
  try {
    for (const name of unit.pause) {
      const target = ctx.units.get(name);
      if (!target || target.kind !== "service") continue;
      const status = await queryService(target.name, target.serviceName, ctx);
      if (!status.active) continue;
      await runStep(ctx, action, buildSystemctlCommand("stop", target.serviceName));
      stopped.push(target.serviceName);
    }
  } catch (error) {
    // Services stopped before the failure come back up; the action still fails.
    await resumeServices(action, stopped, ctx).catch((resumeError: unknown) =>
      logError(`${unit.name}: restarting paused services`, resumeError),
    );
    throw error;
  }
  return stopped;
}

async function resumeServices(action: Action, services: string[], ctx: ModuleContext): Promise<void> {
  for (const service of services) {
    await runStep(ctx, action, buildSystemctlCommand("start", service));
  }
}

export const fileModule: UnitModule<FileUnit, FileSnapshot> = {
  kind: "file",

  async check(unit, ctx): Promise<CheckResult> {
    const current = inspect(unit);
    const observed: ObservedState = {
      unit: unit.name,
      present: current !== null,
      fingerprint: current?.hash ?? null,
      checkedAt: ctx.now().toISOString(),
      detail: current ? { path: unit.path, mode: formatMode(current.mode) } : { path: unit.path },
    };

    if (unit.state === "absent") {
      return current
        ? { status: "drifted", message: `${unit.path} exists`, observed }
        : { status: "in-sync", message: `${unit.path} is absent`, observed };
    }

    if (!current) {
      return { status: "missing", message: `${unit.path} does not exist`, observed, driftKind: "never-synced" };
    }
    if (!current.isFile) {
      return { status: "drifted", message: `${unit.path} is not a regular file`, observed };
    }

    let desired: Buffer;
    try {
      desired = readDesiredContent(unit);
    } catch (error) {
      throw new ProbeFailureError(unit.name, `cannot read source: ${errorMessage(error)}`, error);
    }
    const desiredHash = hashBuffer(desired);

    if (current.hash !== desiredHash) {
      const driftKind = classifyFileDrift(buildStateKey(unit.name, unit.path), desiredHash, current.hash);
      let diff: string | undefined;
      try {
        diff = buildDiff(unit.path, readFileSync(unit.path), desired);
      } catch (error) {
        throw new ProbeFailureError(unit.name, errorMessage(error), error);
      }
      return {
        status: "drifted",
        message: `${unit.path} content differs${DRIFT_NOTES[driftKind] ?? ""}`,
        observed,
        diff,
        driftKind,
      };
    }

    if (unit.mode !== undefined && current.mode !== unit.mode) {
      return {
        status: "drifted",
        message: `${unit.path} mode ${formatMode(current.mode)}, wanted ${formatMode(unit.mode)}`,
        observed,
      };
    }

    return { status: "in-sync", message: `${unit.path} matches`, observed, driftKind: "in-sync" };
  },

  async snapshot(unit): Promise<FileSnapshot> {
    const current = fingerprintFile(unit.path);
    return {
      kind: "file",
      existed: current !== null,
      backup: current?.isFile ? createBackup(unit.path, unit.name) : null,
      mode: current ? current.mode : null,
    };
  },

  async apply(action, unit, snapshot, ctx): Promise<ApplyResult> {
    const key = buildStateKey(unit.name, unit.path);

    if (unit.state === "absent") {
      try {
        rmSync(unit.path, { force: true });
      } catch (error) {
        throw new ActionFailureError(action, errorMessage(error), null, "", error);
      }
      clearEntry(key);
      return { changed: true, message: `Removed ${unit.path}`, backup: snapshot.backup ?? undefined };
    }

    const desired = readDesiredContent(unit);
    const mode = unit.mode ?? snapshot.mode ?? 0o644;

    const paused = await pauseServices(action, unit, ctx);
    try {
      atomicWriteFileSync(unit.path, desired, mode);
    } catch (error) {
      await resumeServices(action, paused, ctx).catch((resumeError: unknown) =>
        logError(`${unit.name}: restarting paused services`, resumeError),
      );
      throw new ActionFailureError(action, errorMessage(error), null, "", error);
    }
    await resumeServices(action, paused, ctx);

    const hash = hashBuffer(desired);
    recordApplied(key, hash, hash, unit.path);
    pruneBackups(unit.name, ctx.settings.backupRetention);

    const resumed = paused.length > 0 ? ` (paused ${paused.join(", ")})` : "";
    return {
      changed: true,
      message: `Wrote ${unit.path} ${formatMode(mode)}${resumed}`,
      backup: snapshot.backup ?? undefined,
    };
  },

  async rollback(action, unit, snapshot): Promise<ApplyResult> {
    const key = buildStateKey(unit.name, unit.path);
    try {
      if (snapshot.backup) {
        restoreBackup(snapshot.backup, unit.path);
        if (snapshot.mode !== null) chmodSync(unit.path, snapshot.mode);
        clearEntry(key);
        return { changed: true, message: `Restored ${unit.path} from ${snapshot.backup}` };
      }
      if (!snapshot.existed && existsSync(unit.path)) {
        rmSync(unit.path, { force: true });
        clearEntry(key);
        return { changed: true, message: `Removed ${unit.path}` };
      }
    } catch (error) {
      throw new ActionFailureError(action, errorMessage(error), null, "", error);
    }
    if (snapshot.existed) {
      logWarn(`${unit.name}: no backup of ${unit.path} to restore`);
    }
    return { changed: false, message: `${unit.path} unchanged` };
  },
};
