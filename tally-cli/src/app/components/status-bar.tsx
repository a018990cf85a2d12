import React from "react";
import { Box, Text } from "ink";
import { formatResult, type AngleMode } from "tally-main";

type Props = {
  readonly angleMode: AngleMode;
  readonly precision: number;
  readonly memory: number;
  readonly historySize: number;
};

export function StatusBar({ angleMode, precision, memory, historySize }: Props): React.JSX.Element {
  const memoryLabel = memory !== 0 ? ` | M ${formatResult(memory, precision)}` : "";

  return (
    <Box paddingX={1} height={1}>
      <Text dimColor>
        {angleMode === "deg" ? "DEG" : "RAD"} | {precision} dp | history {historySize}{memoryLabel}
        {" | Enter: evaluate | Up/Down/PgUp/PgDn: scroll | Ctrl+C: exit"}
      </Text>
    </Box>
  );
}
