import React from "react";
import { Box, Text } from "ink";
import { summarize } from "../lib/render.js";
import type { ActionOutcome, OutcomeStatus, ReconciliationReport } from "../lib/types.js";

interface ReportViewProps {
  report: ReconciliationReport;
}

const OUTCOME_COLORS: Record<OutcomeStatus, string> = {
  applied: "green",
  failed: "red",
  skipped: "gray",
  "rolled-back": "yellow",
};

function OutcomeRow({ outcome }: { outcome: ActionOutcome }) {
  return (
    <Box flexDirection="column">
      <Box>
        <Box width={13}>
          <Text color={OUTCOME_COLORS[outcome.status]}>{outcome.status}</Text>
        </Box>
        <Text>{outcome.action.operation} </Text>
        <Text bold>{outcome.action.unit}</Text>
        <Text color="gray"> · {outcome.message}</Text>
      </Box>
      {outcome.stderr && (
        <Box marginLeft={13}>
          <Text color="red">{outcome.stderr}</Text>
        </Box>
      )}
    </Box>
  );
}

export function ReportView({ report }: ReportViewProps) {
  const failed = report.summary.failed > 0;

  return (
    <Box flexDirection="column">
      {report.probeFailures.map((entry) => (
        <Text key={entry.unit} color="red">
          unknown {entry.unit} · {entry.error ?? entry.message}
        </Text>
      ))}
      {report.outcomes.map((outcome) => (
        <OutcomeRow key={outcome.action.id} outcome={outcome} />
      ))}
      {report.rollbacks.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text bold>Rollback</Text>
          {report.rollbacks.map((outcome) => (
            <OutcomeRow key={outcome.action.id} outcome={outcome} />
          ))}
        </Box>
      )}
      <Box marginTop={1}>
        <Text color={failed ? "red" : "green"}>{summarize(report)}</Text>
      </Box>
    </Box>
  );
}
