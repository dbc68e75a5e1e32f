import { spawn } from "child_process";
import { CommandCancelledError, CommandTimeoutError, CommandUnavailableError } from "./errors.js";
import { logDebug } from "./log.js";

export interface CommandSpec {
  cmd: string;
  args: string[];
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ProgressEvent =
  | { type: "stdout"; data: string }
  | { type: "stderr"; data: string }
  | { type: "done"; exitCode: number }
  | { type: "timeout"; timeoutMs: number }
  | { type: "cancelled" };

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

/**
 * Executes external collaborators (package manager, systemctl).
 * Resolves with the exit status for any process that ran to completion,
 * rejects with CommandUnavailableError or CommandTimeoutError otherwise.
 */
export interface CommandRunner {
  run(command: CommandSpec, options?: RunOptions): Promise<CommandResult>;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;
const KILL_GRACE_MS = 1500;

export function formatCommand(command: CommandSpec): string {
  return [command.cmd, ...command.args].join(" ");
}

export function runCommand(command: CommandSpec, options?: RunOptions): Promise<CommandResult> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const onProgress = options?.onProgress;
  const label = formatCommand(command);

  logDebug(`exec: ${label}`);

  return new Promise<CommandResult>((resolve, reject) => {
    if (options?.signal?.aborted) {
      onProgress?.({ type: "cancelled" });
      reject(new CommandCancelledError(label));
      return;
    }

    const child = spawn(command.cmd, command.args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: command.env ? { ...process.env, ...command.env } : process.env,
    });
    let finished = false;
    let timedOut = false;
    let cancelled = false;
    let stdout = "";
    let stderr = "";

    const terminate = () => {
      child.kill("SIGTERM");
      setTimeout(() => {
        if (!finished) {
          child.kill("SIGKILL");
        }
      }, KILL_GRACE_MS).unref();
    };

    const timeoutId = setTimeout(() => {
      if (finished) return;
      timedOut = true;
      onProgress?.({ type: "timeout", timeoutMs });
      terminate();
    }, timeoutMs);

    const onAbort = () => {
      if (finished) return;
      cancelled = true;
      onProgress?.({ type: "cancelled" });
      terminate();
    };
    options?.signal?.addEventListener("abort", onAbort, { once: true });

    const settle = () => {
      finished = true;
      clearTimeout(timeoutId);
      options?.signal?.removeEventListener("abort", onAbort);
    };

    child.stdout.on("data", (chunk) => {
      const data = String(chunk);
      stdout += data;
      onProgress?.({ type: "stdout", data });
    });

    child.stderr.on("data", (chunk) => {
      const data = String(chunk);
      stderr += data;
      onProgress?.({ type: "stderr", data });
    });

    child.on("error", (error) => {
      if (finished) return;
      settle();
      reject(new CommandUnavailableError(label, error));
    });

    child.on("close", (code) => {
      if (finished) return;
      settle();
      if (timedOut) {
        reject(new CommandTimeoutError(label, timeoutMs));
        return;
      }
      if (cancelled) {
        reject(new CommandCancelledError(label));
        return;
      }
      const exitCode = code ?? 1;
      onProgress?.({ type: "done", exitCode });
      resolve({ exitCode, stdout, stderr });
    });
  });
}

/** Runner backed by child_process.spawn. */
export const systemRunner: CommandRunner = {
  run: runCommand,
};
