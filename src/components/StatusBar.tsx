import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { RunPhase } from "../lib/store.js";

interface StatusBarProps {
  phase: RunPhase;
  sourcePath: string;
  error?: string | null;
}

const PHASE_LABELS: Record<RunPhase, string> = {
  idle: "Starting",
  probing: "Probing host",
  planning: "Planning",
  applying: "Applying",
  verifying: "Verifying",
  done: "Done",
  failed: "Failed",
};

export function StatusBar({ phase, sourcePath, error }: StatusBarProps) {
  const busy = phase !== "done" && phase !== "failed";

  return (
    <Box>
      {busy && (
        <>
          <Text color="cyan">
            <Spinner type="dots" />
          </Text>
          <Text> </Text>
        </>
      )}
      {error ? (
        <>
          <Text color="red">{error}</Text>
          <Text color="gray"> · {sourcePath}</Text>
        </>
      ) : (
        <Text color="gray">
          {PHASE_LABELS[phase]} · {sourcePath}
        </Text>
      )}
    </Box>
  );
}
