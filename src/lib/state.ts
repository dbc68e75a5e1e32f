import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { getCacheDir } from "./config/path.js";
import { atomicWriteFileSync, withFileLockSync } from "./fs-utils.js";
import type { FileDriftKind } from "./types.js";

const AppliedFileSchema = z.object({
  desiredHash: z.string(),
  hostHash: z.string(),
  appliedAt: z.string(),
  path: z.string(),
});

const SyncStateSchema = z.object({
  version: z.literal(1),
  files: z.record(z.string(), AppliedFileSchema),
});

export type AppliedFile = z.infer<typeof AppliedFileSchema>;
export type SyncState = z.infer<typeof SyncStateSchema>;

function emptyState(): SyncState {
  return { version: 1, files: {} };
}

export function getStatePath(): string {
  return join(getCacheDir(), "state.json");
}

export function loadState(): SyncState {
  const path = getStatePath();
  if (!existsSync(path)) {
    return emptyState();
  }
  try {
    const parsed = SyncStateSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    return parsed.success ? parsed.data : emptyState();
  } catch {
    // Corrupt state file: every file reads as never-synced.
    return emptyState();
  }
}

export function saveState(state: SyncState): void {
  const path = getStatePath();
  withFileLockSync(path, () => {
    atomicWriteFileSync(path, JSON.stringify(state, null, 2));
  });
}

/** Key files by unit and path so renaming a unit's target starts fresh. */
export function buildStateKey(unit: string, path: string): string {
  return `${unit}:${path}`;
}

export function recordApplied(key: string, desiredHash: string, hostHash: string, path: string): void {
  const state = loadState();
  state.files[key] = {
    desiredHash,
    hostHash,
    appliedAt: new Date().toISOString(),
    path,
  };
  saveState(state);
}

/**
 * Three-way comparison against the hashes recorded at the last apply:
 * tells an edit made on the host apart from a change to the desired content.
 */
export function classifyFileDrift(key: string, desiredHash: string, hostHash: string | null): FileDriftKind {
  const entry = loadState().files[key];
  if (!entry) {
    return "never-synced";
  }

  const desiredChanged = desiredHash !== entry.desiredHash;
  const hostChanged = hostHash !== entry.hostHash;

  if (!desiredChanged && !hostChanged) return "in-sync";
  if (desiredChanged && !hostChanged) return "desired-changed";
  if (!desiredChanged && hostChanged) return "host-changed";
  return "both-changed";
}

export function clearEntry(key: string): void {
  const state = loadState();
  delete state.files[key];
  saveState(state);
}

export function getEntry(key: string): AppliedFile | undefined {
  return loadState().files[key];
}
