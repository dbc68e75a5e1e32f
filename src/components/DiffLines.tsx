import React from "react";
import { Box, Text } from "ink";

interface DiffLinesProps {
  diff: string;
  maxLines?: number;
}

function colorFor(line: string): string | undefined {
  if (line.startsWith("@@")) return "cyan";
  if (line.startsWith("+++") || line.startsWith("---")) return "gray";
  if (line.startsWith("+")) return "green";
  if (line.startsWith("-")) return "red";
  return undefined;
}

/** Unified diff body, without the "Index:" and "===" preamble. */
export function DiffLines({ diff, maxLines = 20 }: DiffLinesProps) {
  const lines = diff.split("\n").filter((line) => line.length > 0 && !line.startsWith("Index:") && !/^=+$/.test(line));
  const visible = lines.slice(0, maxLines);
  const hidden = lines.length - visible.length;

  return (
    <Box flexDirection="column" marginLeft={4}>
      {visible.map((line, i) => (
        <Text key={i} color={colorFor(line)}>
          {line}
        </Text>
      ))}
      {hidden > 0 && <Text color="gray">… {hidden} more lines</Text>}
    </Box>
  );
}
