import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { createBackup, pruneBackups, restoreBackup } from "./backup.js";

// Backups live under XDG_CACHE_HOME; point it at a temp dir.
let tmp: string;
const ORIG_XDG = process.env.XDG_CACHE_HOME;

beforeEach(() => {
  tmp = mkdtempSync(join(tmpdir(), "converge-backup-"));
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

const pause = () => new Promise((resolve) => setTimeout(resolve, 5));

describe("createBackup", () => {
  it("copies an existing file under the unit's backup directory", () => {
    const file = join(tmp, "motd");
    writeFileSync(file, "welcome\n");

    const backup = createBackup(file, "motd");
    expect(backup).not.toBeNull();
    expect(backup?.startsWith(join(tmp, "cache", "converge", "backups", "motd"))).toBe(true);
    expect(backup?.endsWith("/motd")).toBe(true);
    expect(readFileSync(backup ?? "", "utf-8")).toBe("welcome\n");
  });

  it("returns null for a file that does not exist", () => {
    expect(createBackup(join(tmp, "missing"), "motd")).toBeNull();
  });
});

describe("restoreBackup", () => {
  it("puts the saved content back", () => {
    const file = join(tmp, "motd");
    writeFileSync(file, "before\n");
    const backup = createBackup(file, "motd");
    writeFileSync(file, "after\n");

    restoreBackup(backup ?? "", file);
    expect(readFileSync(file, "utf-8")).toBe("before\n");
  });

  it("throws when the backup is gone", () => {
    const missing = join(tmp, "nope");
    expect(() => restoreBackup(missing, join(tmp, "motd"))).toThrow(`Backup not found: ${missing}`);
  });
});

describe("pruneBackups", () => {
  it("keeps the newest backups up to the retention", async () => {
    const file = join(tmp, "motd");
    const created: string[] = [];
    for (let i = 0; i < 4; i++) {
      writeFileSync(file, `version ${i}\n`);
      created.push(createBackup(file, "motd") ?? "");
      await pause();
    }

    pruneBackups("motd", 2);
    expect(readdirSync(join(tmp, "cache", "converge", "backups", "motd"))).toHaveLength(2);
    expect(existsSync(created[3] ?? "")).toBe(true);
    expect(existsSync(created[2] ?? "")).toBe(true);
    expect(existsSync(created[0] ?? "")).toBe(false);
  });

  it("does nothing for a unit without backups", () => {
    expect(() => pruneBackups("never-backed-up", 1)).not.toThrow();
    expect(existsSync(join(tmp, "cache", "converge", "backups", "never-backed-up"))).toBe(false);
  });
});
