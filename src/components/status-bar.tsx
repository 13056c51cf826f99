import React, { type FC } from "react";
import { Box, Text, useStdout } from "ink";
import { describeStatus, type ConnectionStatus, type ManagerPhase } from "../sdk/status.js";
import { statusColor } from "../lib/formatting.js";
import { colors } from "../lib/palette.js";

export interface StatusBarProps {
  serviceName: string;
  status: ConnectionStatus;
  phase: ManagerPhase;
  radioEnabled: boolean;
  recordCount: number;
  error: string | null;
}

export const StatusBar: FC<StatusBarProps> = ({
  serviceName,
  status,
  phase,
  radioEnabled,
  recordCount,
  error,
}) => {
  const { stdout } = useStdout();
  const width = stdout?.columns ?? 80;

  return (
    <Box flexDirection="column">
      <Box paddingX={1} justifyContent="space-between">
        <Box gap={1}>
          <Text color={colors.accent} bold>
            linkmux
          </Text>
          <Text dimColor>{serviceName}</Text>
          <Text dimColor>│</Text>
          <Text color={statusColor(status)} bold>
            {describeStatus(status)}
          </Text>
        </Box>
        <Box gap={1}>
          <Text dimColor>{phase}</Text>
          <Text dimColor>│</Text>
          <Text color={radioEnabled ? colors.success : colors.error}>
            radio {radioEnabled ? "on" : "off"}
          </Text>
          <Text dimColor>│</Text>
          <Text dimColor>{recordCount} records</Text>
        </Box>
      </Box>
      {error && (
        <Box paddingX={1}>
          <Text color={colors.error}>✗ {error}</Text>
        </Box>
      )}
      <Text dimColor>{"─".repeat(width)}</Text>
    </Box>
  );
};

