import React from "react";
import { Box, Text } from "ink";
import type { Plan } from "../lib/types.js";

interface PlanViewProps {
  plan: Plan;
}

export function PlanView({ plan }: PlanViewProps) {
  if (plan.actions.length === 0 && plan.held.length === 0) {
    return <Text color="green">Nothing to do: host matches the desired state.</Text>;
  }

  return (
    <Box flexDirection="column">
      {plan.actions.map((action) => (
        <Box key={action.id}>
          <Text color="gray">{String(action.rank + 1).padStart(3)}. </Text>
          <Text color="cyan">{action.operation} </Text>
          <Text bold>{action.unit}</Text>
          <Text color="gray"> · {action.reason}</Text>
        </Box>
      ))}
      {plan.held.map((held) => (
        <Box key={held.unit}>
          <Text color="yellow">held </Text>
          <Text bold>{held.unit}</Text>
          <Text color="gray"> · waiting on {held.blockedBy}, whose state is unknown</Text>
        </Box>
      ))}
    </Box>
  );
}
