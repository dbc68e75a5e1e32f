import React, { useEffect } from "react";
import { Box, Text, useApp } from "ink";
import { DriftView } from "./components/DriftView.js";
import { PlanView } from "./components/PlanView.js";
import { ReportView } from "./components/ReportView.js";
import { RunView } from "./components/RunView.js";
import { StatusBar } from "./components/StatusBar.js";
import type { ReconcileMode, ReconcileOptions, ReconcileResult } from "./lib/reconciler.js";
import { useRunStore } from "./lib/store.js";
import type { DesiredState } from "./lib/types.js";

interface AppProps {
  desired: DesiredState;
  options: ReconcileOptions;
  verbose?: boolean;
  onDone: (result: ReconcileResult | null, error: string | null) => void;
}

function ResultView({ mode, result, verbose }: { mode: ReconcileMode; result: ReconcileResult; verbose: boolean }) {
  return (
    <Box flexDirection="column">
      {(mode === "check" || verbose) && <DriftView drift={result.drift} showDiffs={verbose} />}
      {result.plan && !result.report && mode !== "check" && <PlanView plan={result.plan} />}
      {result.report && <ReportView report={result.report} />}
      {result.verification && !result.converged && (
        <Box marginTop={1} flexDirection="column">
          <Text color="yellow">Host has not converged:</Text>
          <DriftView drift={result.verification} />
        </Box>
      )}
    </Box>
  );
}

export function App({ desired, options, verbose = false, onDone }: AppProps) {
  const { exit } = useApp();
  const { phase, running, outcomes, output, result, error, run } = useRunStore();

  useEffect(() => {
    void run(desired, options).then((finished) => {
      onDone(finished, useRunStore.getState().error);
      exit();
    });
    // One run per mount.
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  return (
    <Box flexDirection="column">
      {phase === "applying" && <RunView running={running} outcomes={outcomes} output={output} outputLines={verbose ? 10 : 3} />}
      {result && <ResultView mode={options.mode} result={result} verbose={verbose} />}
      <Box marginTop={1}>
        <StatusBar phase={phase} sourcePath={desired.sourcePath} error={error} />
      </Box>
    </Box>
  );
}
