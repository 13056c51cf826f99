import React, { type FC } from "react";
import { Box, Text } from "ink";
import type { RecordEntry } from "../state/index.js";
import { formatTime, summarizeRecord } from "../lib/formatting.js";
import { colors } from "../lib/palette.js";

const MAX_BODY_LEN = 120;

export interface RecordLogProps {
  records: readonly RecordEntry[];
  height: number;
}

export const RecordLog: FC<RecordLogProps> = ({ records, height }) => {
  // Reserve 2 lines for the header and bottom border
  const bodyHeight = Math.max(1, height - 2);

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={colors.border}
      height={height}
      overflow="hidden"
    >
      <Box paddingX={1}>
        <Text bold color={colors.accent}>
          Records
        </Text>
        <Text dimColor> ({records.length})</Text>
      </Box>

      {records.length === 0 ? (
        <Box paddingX={1}>
          <Text dimColor>Nothing received yet.</Text>
        </Box>
      ) : (
        <Box flexDirection="column" height={bodyHeight} overflow="hidden">
          {records.slice(-bodyHeight).map((entry) => {
            const incoming = entry.direction === "in";
            return (
              <Box key={entry.id} paddingX={1} gap={1}>
                <Text dimColor>{formatTime(entry.timestamp)}</Text>
                <Text color={incoming ? colors.incoming : colors.outgoing}>
                  {incoming ? "←" : "→"}
                </Text>
                {entry.peerId && <Text bold>{entry.peerId}</Text>}
                <Text>{summarizeRecord(entry.record, MAX_BODY_LEN)}</Text>
              </Box>
            );
          })}
        </Box>
      )}
    </Box>
  );
};
