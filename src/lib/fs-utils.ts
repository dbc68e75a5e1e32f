import {
  chmodSync,
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from "fs";
import { basename, dirname, join } from "path";

const LOCK_RETRY_COUNT = 5;
const LOCK_RETRY_DELAY_MS = 50;
const LOCK_STALE_MS = 30_000;

function sleepSync(ms: number): void {
  const buffer = new SharedArrayBuffer(4);
  const view = new Int32Array(buffer);
  Atomics.wait(view, 0, 0, ms);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Write through a temp file in the same directory and rename over the target,
 * so readers never see a half-written configuration file.
 */
export function atomicWriteFileSync(path: string, content: string | Buffer, mode?: number): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const tempPath = join(dir, `.${basename(path)}.${Date.now()}.${process.pid}.tmp`);
  const fd = openSync(tempPath, "w", mode ?? 0o644);
  try {
    writeFileSync(fd, content);
    fsyncSync(fd);
  } catch (error) {
    closeSync(fd);
    rmSync(tempPath, { force: true });
    throw error;
  }
  closeSync(fd);
  if (mode !== undefined) {
    // openSync's mode is filtered by the umask
    chmodSync(tempPath, mode);
  }
  renameSync(tempPath, path);
}

export function withFileLockSync<T>(path: string, fn: () => T): T {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const lockPath = `${path}.lock`;
  let fd: number | null = null;

  for (let attempt = 0; attempt <= LOCK_RETRY_COUNT; attempt += 1) {
    try {
      fd = openSync(lockPath, "wx");
      writeFileSync(fd, String(process.pid));
      break;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EEXIST") {
        throw error;
      }

      const stat = statSync(lockPath, { throwIfNoEntry: false });
      if (stat && Date.now() - stat.mtimeMs > LOCK_STALE_MS) {
        rmSync(lockPath, { force: true });
        continue;
      }

      if (attempt === LOCK_RETRY_COUNT) {
        throw new Error(`Timed out waiting for lock on ${path}`);
      }

      sleepSync(LOCK_RETRY_DELAY_MS * (attempt + 1));
    }
  }

  try {
    return fn();
  } finally {
    if (fd !== null) {
      closeSync(fd);
    }
    rmSync(lockPath, { force: true });
  }
}
