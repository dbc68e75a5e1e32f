import { Command, InvalidArgumentError, Option } from "commander";
import { dependencyOrder, loadDesiredState } from "./lib/desired-state.js";
import type { CommandRunner } from "./lib/exec.js";
import { logDebug, logError, logWarn, setLogLevel } from "./lib/log.js";
import type { HostDrivers } from "./lib/modules/index.js";
import { reconcile, type ReconcileMode, type ReconcileOptions, type ReconcileResult } from "./lib/reconciler.js";
import {
  renderDriftLog,
  renderDriftTable,
  renderPlanLog,
  renderPlanTable,
  renderReportLog,
  renderReportTable,
} from "./lib/render.js";
import { createStopSignalHandler } from "./lib/signals.js";
import type { DesiredState, ReconcileSettings } from "./lib/types.js";

export type OutputFormat = "human" | "table" | "json";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_DRIFT = 2;

export interface InteractiveRun {
  result: ReconcileResult | null;
  error: string | null;
}

export interface CliDeps {
  runner?: CommandRunner;
  drivers?: HostDrivers;
  now?: () => Date;
  print?: (text: string) => void;
  setExitCode?: (code: number) => void;
  /** Renders a human-format run live; absent when output is not a terminal. */
  renderInteractive?: (desired: DesiredState, options: ReconcileOptions, verbose: boolean) => Promise<InteractiveRun>;
}

interface RunFlags {
  file?: string;
  format: OutputFormat;
  concurrency?: number;
  rollback?: boolean;
  timeout?: number;
}

function parseInteger(min: number, max: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Expected an integer from ${min} to ${max}.`);
    }
    return parsed;
  };
}

function settingOverrides(flags: RunFlags): Partial<ReconcileSettings> {
  const overrides: Partial<ReconcileSettings> = {};
  if (flags.concurrency !== undefined) overrides.concurrency = flags.concurrency;
  if (flags.rollback === false) overrides.rollback = false;
  if (flags.timeout !== undefined) overrides.commandTimeoutMs = flags.timeout;
  return overrides;
}

export function exitCodeFor(mode: ReconcileMode, result: ReconcileResult): number {
  switch (mode) {
    case "check":
      return result.converged ? EXIT_OK : EXIT_DRIFT;
    case "plan":
      return result.plan && (result.plan.actions.length > 0 || result.plan.held.length > 0) ? EXIT_DRIFT : EXIT_OK;
    case "apply":
      return result.converged ? EXIT_OK : EXIT_ERROR;
  }
}

export function toJson(result: ReconcileResult): string {
  return JSON.stringify(
    {
      source: result.desired.sourcePath,
      converged: result.converged,
      drift: result.drift,
      plan: result.plan,
      report: result.report,
      verification: result.verification,
    },
    null,
    2,
  );
}

export function formatResult(mode: ReconcileMode, result: ReconcileResult, format: OutputFormat): string {
  if (format === "json") return toJson(result);

  const table = format === "table";
  const sections: string[] = [];
  if (mode === "check" || !result.plan) {
    sections.push(table ? renderDriftTable(result.drift) : renderDriftLog(result.drift).join("\n"));
  } else if (!result.report) {
    sections.push(table ? renderPlanTable(result.plan) : renderPlanLog(result.plan).join("\n"));
  } else {
    sections.push(table ? renderReportTable(result.report) : renderReportLog(result.report).join("\n"));
  }
  if (result.verification && !result.converged) {
    sections.push("Host has not converged:");
    sections.push(table ? renderDriftTable(result.verification) : renderDriftLog(result.verification).join("\n"));
  }
  return sections.join("\n\n");
}

function withRunOptions(command: Command, mode: ReconcileMode): Command {
  command
    .option("-f, --file <path>", "Desired-state document (default: ~/.config/converge/host.yaml)")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "table", "json"]).default("human"))
    .option("--timeout <ms>", "Per-command timeout in milliseconds", parseInteger(100, 3_600_000));
  if (mode === "apply") {
    command
      .option("--concurrency <n>", "Actions applied at once", parseInteger(1, 32))
      .option("--no-rollback", "Leave applied actions in place after a failure");
  }
  return command;
}

export function buildProgram(deps: CliDeps = {}): Command {
  const print = deps.print ?? ((text: string) => console.log(text));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command()
    .name("converge")
    .description("Reconcile packages, services and configuration files toward a declared state")
    .option("--verbose", "Debug logging and full diffs", false)
    .showHelpAfterError();

  const verbose = (): boolean => {
    const enabled = Boolean(program.opts<{ verbose?: boolean }>().verbose);
    if (enabled) setLogLevel("debug");
    return enabled;
  };

  program
    .command("validate")
    .description("Load and validate the desired state without touching the host")
    .option("-f, --file <path>", "Desired-state document")
    .action((flags: { file?: string }) => {
      verbose();
      try {
        const desired = loadDesiredState(flags.file);
        const order = dependencyOrder(desired);
        print(`${desired.sourcePath}: ${order.length} unit(s) OK`);
        for (const name of order) {
          const unit = desired.units.get(name);
          if (!unit) continue;
          print(`  ${name} (${unit.kind})`);
          logDebug(`${name} depends on ${unit.dependencies.join(", ") || "nothing"}`);
        }
        setExitCode(EXIT_OK);
      } catch (error) {
        logError("validate", error);
        setExitCode(EXIT_ERROR);
      }
    });

  const runMode = async (mode: ReconcileMode, flags: RunFlags): Promise<void> => {
    const debug = verbose();

    let desired: DesiredState;
    try {
      desired = loadDesiredState(flags.file);
    } catch (error) {
      logError(mode, error);
      setExitCode(EXIT_ERROR);
      return;
    }

    const stop = createStopSignalHandler((signal) =>
      logWarn(`${signal} received: stopping and rolling back applied actions`),
    );
    const options: ReconcileOptions = {
      mode,
      runner: deps.runner,
      drivers: deps.drivers,
      settings: settingOverrides(flags),
      signal: stop.signal,
      now: deps.now,
    };

    try {
      if (flags.format === "human" && deps.renderInteractive) {
        const run = await deps.renderInteractive(desired, options, debug);
        if (!run.result) {
          logError(mode, run.error ?? "run failed");
          setExitCode(EXIT_ERROR);
          return;
        }
        setExitCode(exitCodeFor(mode, run.result));
        return;
      }

      const result = await reconcile(desired, options);
      print(formatResult(mode, result, flags.format));
      setExitCode(exitCodeFor(mode, result));
    } catch (error) {
      logError(mode, error);
      setExitCode(EXIT_ERROR);
    } finally {
      stop.cleanup();
    }
  };

  withRunOptions(program.command("check").description("Report drift between the host and the desired state"), "check").action(
    (flags: RunFlags) => runMode("check", flags),
  );
  withRunOptions(program.command("plan").description("Show the ordered actions that apply would run"), "plan").action(
    (flags: RunFlags) => runMode("plan", flags),
  );
  withRunOptions(program.command("apply").description("Converge the host, rolling back on failure"), "apply").action(
    (flags: RunFlags) => runMode("apply", flags),
  );

  return program;
}
