import { readFileSync, statSync } from "fs";
import { createHash } from "crypto";

export function hashBuffer(buffer: Buffer): string {
  return createHash("sha256").update(buffer).digest("hex");
}

export interface FileFingerprint {
  hash: string;
  /** Permission bits only (e.g. 0o644). */
  mode: number;
  isFile: boolean;
}

/** Hash and permission bits of a path, or null when nothing is there. Symlinks are followed. */
export function fingerprintFile(path: string): FileFingerprint | null {
  const stat = statSync(path, { throwIfNoEntry: false });
  if (!stat) return null;
  if (stat.isDirectory()) {
    return { hash: "", mode: stat.mode & 0o777, isFile: false };
  }
  const data = readFileSync(path);
  return { hash: hashBuffer(data), mode: stat.mode & 0o777, isFile: true };
}
