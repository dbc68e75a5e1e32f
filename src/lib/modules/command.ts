import { ActionFailureError, ProbeFailureError, errorMessage } from "../errors.js";
import { formatCommand, type CommandResult, type CommandSpec, type RunOptions } from "../exec.js";
import type { Action } from "../types.js";
import type { ModuleContext } from "./types.js";

function runOptions(ctx: ModuleContext, unit: string): RunOptions {
  const { onProgress } = ctx;
  return {
    timeoutMs: ctx.settings.commandTimeoutMs,
    signal: ctx.signal,
    onProgress: onProgress ? (event) => onProgress(unit, event) : undefined,
  };
}

/** Run a read-only query. Anything but a completed process is a probe failure. */
export async function runProbe(ctx: ModuleContext, unit: string, command: CommandSpec): Promise<CommandResult> {
  try {
    return await ctx.runner.run(command, runOptions(ctx, unit));
  } catch (error) {
    throw new ProbeFailureError(unit, errorMessage(error), error);
  }
}

/** Run a mutating command; a non-zero exit fails the action with its stderr. */
export async function runStep(ctx: ModuleContext, action: Action, command: CommandSpec): Promise<CommandResult> {
  let result: CommandResult;
  try {
    result = await ctx.runner.run(command, runOptions(ctx, action.unit));
  } catch (error) {
    throw new ActionFailureError(action, errorMessage(error), null, "", error);
  }
  if (result.exitCode !== 0) {
    throw new ActionFailureError(
      action,
      `${formatCommand(command)} exited with ${result.exitCode}`,
      result.exitCode,
      result.stderr.trim(),
    );
  }
  return result;
}
