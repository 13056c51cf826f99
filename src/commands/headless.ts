/**
 * `linkmux --no-tui`: headless mode.
 *
 * Received records go to stdout as JSON lines. Lines read from stdin are
 * sent as records (JSON when they parse, strings otherwise). Ends when
 * stdin closes.
 */
import { createInterface } from "node:readline";
import type { Link } from "../sdk/link.js";
import { isErrorCode } from "../sdk/errors.js";
import { parseRecordInput } from "../lib/formatting.js";

export interface HeadlessOptions {
  /** Connect out to this peer instead of listening. */
  connectTo?: string;
  input?: NodeJS.ReadableStream;
  /** Line sink for received records. Default: stdout */
  write?: (line: string) => void;
}

export async function runHeadless(link: Link, opts: HeadlessOptions = {}): Promise<void> {
  const { manager, logger } = link;
  const write = opts.write ?? ((line: string) => process.stdout.write(line + "\n"));
  const input = opts.input ?? process.stdin;

  // Iterator first, so nothing received during startup is missed
  const records = manager.incomingData[Symbol.asyncIterator]();

  const rl = createInterface({ input, terminal: false });
  rl.on("line", (line) => {
    if (!line.trim()) return;
    void manager.send(parseRecordInput(line)).then((sent) => {
      if (!sent) logger.warn("Not connected, line dropped", { line });
    });
  });
  rl.on("close", () => link.close());

  manager.start();
  if (opts.connectTo) {
    try {
      await manager.connect(opts.connectTo);
    } catch (err) {
      if (isErrorCode(err, "PERMISSION_DENIED")) {
        process.stderr.write(err.message + "\n");
        process.exitCode = 1;
        rl.close();
        return;
      }
      throw err;
    }
  }

  try {
    while (true) {
      const next = await records.next();
      if (next.done) break;
      write(JSON.stringify(next.value) ?? String(next.value));
    }
  } finally {
    rl.close();
  }
}
