import { create } from "zustand";
import type { ProgressEvent } from "./exec.js";
import { errorMessage } from "./errors.js";
import { reconcile, type ReconcileOptions, type ReconcilePhase, type ReconcileResult } from "./reconciler.js";
import type { Action, ActionOutcome, DesiredState } from "./types.js";

export type RunPhase = ReconcilePhase | "idle" | "failed";

export interface RunState {
  phase: RunPhase;
  /** Actions currently being applied, by id. */
  running: Action[];
  outcomes: ActionOutcome[];
  /** Tail of command output, prefixed with the unit that produced it. */
  output: string[];
  result: ReconcileResult | null;
  error: string | null;
}

interface RunActions {
  setPhase: (phase: ReconcilePhase) => void;
  actionStarted: (action: Action) => void;
  actionFinished: (outcome: ActionOutcome) => void;
  recordProgress: (unit: string, event: ProgressEvent) => void;
  finish: (result: ReconcileResult) => void;
  fail: (error: unknown) => void;
  reset: () => void;
  run: (desired: DesiredState, options: ReconcileOptions) => Promise<ReconcileResult | null>;
}

export type RunStore = RunState & RunActions;

export const OUTPUT_MAX_LINES = 200;

const INITIAL_STATE: RunState = {
  phase: "idle",
  running: [],
  outcomes: [],
  output: [],
  result: null,
  error: null,
};

/** Strip ANSI escape sequences so Ink doesn't re-interpret raw codes. */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, "");
}

// Units run concurrently, so the line a `\r` rewrites may not be the newest one.
function lastLineOf(lines: string[], prefix: string): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i]?.startsWith(prefix)) return i;
  }
  return -1;
}

/**
 * Append process output line by line. A bare `\r` overwrites the unit's
 * latest line, the way package manager progress bars expect.
 */
export function appendOutput(existing: string[], unit: string, chunk: string): string[] {
  if (!chunk) return existing;

  const clean = stripAnsi(chunk);
  const next = [...existing];
  const hasCarriageReturn = clean.includes("\r");
  const prefix = `${unit}: `;
  const segments = clean.split("\n");

  for (let i = 0; i < segments.length; i++) {
    let seg = segments[i] ?? "";
    if (seg.includes("\r")) {
      seg = seg.split("\r").filter((part) => part.length > 0).pop() ?? "";
    }

    const trimmed = seg.trim();
    if (trimmed.length === 0) continue;

    const own = hasCarriageReturn && i === 0 ? lastLineOf(next, prefix) : -1;
    if (own >= 0) {
      next[own] = prefix + trimmed;
    } else {
      next.push(prefix + trimmed);
    }
  }

  return next.length <= OUTPUT_MAX_LINES ? next : next.slice(next.length - OUTPUT_MAX_LINES);
}

function describeProgress(event: ProgressEvent): string | null {
  switch (event.type) {
    case "stdout":
    case "stderr":
      return event.data;
    case "timeout":
      return `Timed out after ${event.timeoutMs}ms`;
    case "cancelled":
      return "Cancelled";
    case "done":
      return null;
  }
}

export const useRunStore = create<RunStore>((set, get) => ({
  ...INITIAL_STATE,

  setPhase: (phase) => set({ phase }),
  actionStarted: (action) => set((state) => ({ running: [...state.running, action] })),
  actionFinished: (outcome) =>
    set((state) => ({
      running: state.running.filter((action) => action.id !== outcome.action.id),
      outcomes: [...state.outcomes, outcome],
    })),
  recordProgress: (unit, event) => {
    const text = describeProgress(event);
    if (text === null) return;
    set((state) => ({ output: appendOutput(state.output, unit, text) }));
  },
  finish: (result) => set({ phase: "done", running: [], result }),
  fail: (error) => set({ phase: "failed", running: [], error: errorMessage(error) }),
  reset: () => set({ ...INITIAL_STATE }),

  run: async (desired, options) => {
    const store = get();
    store.reset();
    try {
      const result = await reconcile(desired, {
        ...options,
        onPhase: (phase) => {
          get().setPhase(phase);
          options.onPhase?.(phase);
        },
        onStart: (action) => {
          get().actionStarted(action);
          options.onStart?.(action);
        },
        onOutcome: (outcome) => {
          get().actionFinished(outcome);
          options.onOutcome?.(outcome);
        },
        onProgress: (unit, event) => {
          get().recordProgress(unit, event);
          options.onProgress?.(unit, event);
        },
      });
      get().finish(result);
      return result;
    } catch (error) {
      get().fail(error);
      return null;
    }
  },
}));
