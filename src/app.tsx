import React, { useEffect, type FC } from "react";
import { Box, Text, useApp, useInput, useStdout } from "ink";
import { useLink } from "./hooks/use-link.js";
import { StatusBar } from "./components/status-bar.js";
import { RecordLog } from "./components/record-log.js";
import { SendInput } from "./components/send-input.js";
import { parseRecordInput } from "./lib/formatting.js";
import { describeStatus } from "./sdk/status.js";
import type { ConnectionManager } from "./sdk/manager.js";

export interface AppProps {
  manager: ConnectionManager<unknown>;
  serviceName: string;
  /** Connect out on startup instead of listening. */
  connectTo?: string;
}

export const App: FC<AppProps> = ({ manager, serviceName, connectTo }) => {
  const [state, actions] = useLink(manager, { connectTo });
  const { exit } = useApp();
  const { stdout } = useStdout();

  // Terminal tab title follows the connection status
  useEffect(() => {
    process.stdout.write(`\x1b]0;linkmux · ${describeStatus(state.status)}\x07`);
  }, [state.status]);

  // Restore terminal title on unmount
  useEffect(() => {
    return () => {
      process.stdout.write("\x1b]0;\x07");
    };
  }, []);

  useInput((input, key) => {
    if (!key.ctrl) return;
    if (input === "c") exit();
    if (input === "d") actions.disconnect();
    if (input === "r") actions.listen();
    if (input === "l") actions.clearRecords();
  });

  const rows = stdout?.rows ?? 24;
  const connected = state.status.kind === "connected";

  return (
    <Box flexDirection="column" width="100%">
      <StatusBar
        serviceName={serviceName}
        status={state.status}
        phase={state.phase}
        radioEnabled={state.radioEnabled}
        recordCount={state.recordCount}
        error={state.linkError}
      />

      <RecordLog records={state.records} height={Math.max(5, rows - 6)} />

      <SendInput
        label={state.boundPeer ?? "no peer"}
        placeholder={connected ? "Type a record (JSON or text)…" : "Waiting for a peer…"}
        onSubmit={(line) => actions.send(parseRecordInput(line))}
      />

      <Box paddingX={1} gap={1}>
        <Text dimColor>
          <Text bold>ctrl+c</Text> exit
        </Text>
        <Text dimColor>│</Text>
        <Text dimColor>
          <Text bold>ctrl+d</Text> disconnect
        </Text>
        <Text dimColor>│</Text>
        <Text dimColor>
          <Text bold>ctrl+r</Text> listen
        </Text>
        <Text dimColor>│</Text>
        <Text dimColor>
          <Text bold>ctrl+l</Text> clear
        </Text>
      </Box>
    </Box>
  );
};
