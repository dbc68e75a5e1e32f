import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { Action, ActionOutcome } from "../lib/types.js";

interface RunViewProps {
  running: Action[];
  outcomes: ActionOutcome[];
  output: string[];
  outputLines?: number;
}

export function RunView({ running, outcomes, output, outputLines = 5 }: RunViewProps) {
  const tail = outputLines > 0 ? output.slice(-outputLines) : [];

  return (
    <Box flexDirection="column">
      {outcomes.map((outcome) => (
        <Text key={outcome.action.id} color={outcome.status === "applied" ? "green" : "red"}>
          {outcome.status === "applied" ? "✓" : "✗"} {outcome.action.operation} {outcome.action.unit}
        </Text>
      ))}
      {running.map((action) => (
        <Box key={action.id}>
          <Text color="cyan">
            <Spinner type="dots" />
          </Text>
          <Text>
            {" "}
            {action.operation} {action.unit}
          </Text>
        </Box>
      ))}
      {tail.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          {tail.map((line, i) => (
            <Text key={i} color="gray">
              {line}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
