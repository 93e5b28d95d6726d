/**
 * Cost report for `cmdfor cost`.
 */

import React from "react";
import { Box, Text } from "ink";
import type { DailyCosts } from "./ledger.js";

export interface CostRow {
  day: string;
  cost: string;
}

/** Days in ascending order, costs with six decimals */
export function costRows(costs: DailyCosts): { rows: CostRow[]; total: string } {
  const days = Object.keys(costs).sort();
  let total = 0;
  const rows = days.map((day) => {
    const cost = costs[day] ?? 0;
    total += cost;
    return { day, cost: formatUsd(cost) };
  });
  return { rows, total: formatUsd(total) };
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(6)}`;
}

export function CostTable({ costs }: { costs: DailyCosts }) {
  const { rows, total } = costRows(costs);

  if (rows.length === 0) {
    return <Text dimColor>No costs recorded yet.</Text>;
  }

  const costWidth = Math.max("Cost".length, total.length, ...rows.map((r) => r.cost.length));

  return (
    <Box flexDirection="column">
      <Text bold>
        {"Date".padEnd(12)}
        {"Cost".padStart(costWidth)}
      </Text>
      {rows.map((row) => (
        <Text key={row.day}>
          {row.day.padEnd(12)}
          {row.cost.padStart(costWidth)}
        </Text>
      ))}
      <Text bold color="cyan">
        {"Total".padEnd(12)}
        {total.padStart(costWidth)}
      </Text>
    </Box>
  );
}
