import React from "react";
import { Box, Text } from "ink";
import type { DriftReport, DriftStatus } from "../lib/types.js";
import { DiffLines } from "./DiffLines.js";

interface DriftViewProps {
  drift: DriftReport;
  showDiffs?: boolean;
}

const STATUS_COLORS: Record<DriftStatus, string> = {
  "in-sync": "green",
  drifted: "yellow",
  missing: "yellow",
  unknown: "red",
};

export function DriftView({ drift, showDiffs = false }: DriftViewProps) {
  if (drift.entries.length === 0) {
    return <Text color="gray">No units declared.</Text>;
  }

  return (
    <Box flexDirection="column">
      {drift.entries.map((entry) => (
        <Box key={entry.unit} flexDirection="column">
          <Box>
            <Box width={10}>
              <Text color={STATUS_COLORS[entry.status]}>{entry.status}</Text>
            </Box>
            <Text bold>{entry.unit}</Text>
            <Text color="gray"> ({entry.kind}) </Text>
            <Text>{entry.error ?? entry.message}</Text>
          </Box>
          {showDiffs && entry.diff && <DiffLines diff={entry.diff} />}
        </Box>
      ))}
    </Box>
  );
}
