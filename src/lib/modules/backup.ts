import { existsSync, mkdirSync, cpSync, readdirSync, rmSync, statSync } from "fs";
import { join, basename, dirname } from "path";
import { getCacheDir } from "../config/path.js";

const DEFAULT_BACKUP_RETENTION = 3;

function getBackupBaseDir(): string {
  return join(getCacheDir(), "backups");
}

export function buildBackupPath(targetPath: string, unit: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  return join(getBackupBaseDir(), unit, `${timestamp}-${process.pid}`, basename(targetPath));
}

/** Copy the current file aside before it is overwritten. Null when there is nothing to back up. */
export function createBackup(targetPath: string, unit: string): string | null {
  if (!existsSync(targetPath)) return null;

  const backupPath = buildBackupPath(targetPath, unit);
  mkdirSync(dirname(backupPath), { recursive: true });
  cpSync(targetPath, backupPath, { preserveTimestamps: true });

  return backupPath;
}

export function restoreBackup(backupPath: string, targetPath: string): void {
  if (!existsSync(backupPath)) {
    throw new Error(`Backup not found: ${backupPath}`);
  }
  mkdirSync(dirname(targetPath), { recursive: true });
  cpSync(backupPath, targetPath, { preserveTimestamps: true });
}

export function pruneBackups(unit: string, retention?: number): void {
  const limit = retention ?? DEFAULT_BACKUP_RETENTION;
  const unitDir = join(getBackupBaseDir(), unit);
  if (!existsSync(unitDir)) return;

  const entries = readdirSync(unitDir)
    .filter((name) => statSync(join(unitDir, name)).isDirectory())
    .sort()
    .reverse(); // Newest first (ISO timestamps sort lexicographically)

  for (const entry of entries.slice(limit)) {
    rmSync(join(unitDir, entry), { recursive: true, force: true });
  }
}
