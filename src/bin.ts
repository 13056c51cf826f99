#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { parseLogLevel, resolveConfig, type LinkConfig } from "./sdk/config.js";
import { createLink } from "./sdk/link.js";
import { ConfigError, isLinkError } from "./sdk/errors.js";

// --- Parse CLI args ---

const argv = await yargs(hideBin(process.argv))
  .scriptName("linkmux")
  .usage("Usage: $0 [command] [options]")
  .option("service", {
    type: "string",
    describe: "Service name to listen under",
  })
  .option("host", {
    type: "string",
    describe: "Listen address",
  })
  .option("port", {
    alias: "p",
    type: "number",
    describe: "Listen port",
  })
  .option("log-level", {
    type: "string",
    describe: "debug, info, warn, error or silent",
  })
  .option("tui", {
    type: "boolean",
    default: true,
    describe: "Interactive monitor; --no-tui prints records as JSON lines and sends stdin lines",
  })
  .command(["listen", "$0"], "Wait for a peer to connect (default)")
  .command("connect <peer>", "Connect out to a peer (host:port or bonded name)", (y) =>
    y.positional("peer", {
      type: "string",
      describe: "Peer to connect to",
      demandOption: true,
    }),
  )
  .command("peers", "List bonded peers")
  .command("doctor", "Check that a link can be brought up")
  .version(false)
  .option("version", {
    type: "boolean",
    default: false,
    describe: "Print version information and exit",
  })
  .strict()
  .help()
  .parse();

// --- Resolve config ---

let config: LinkConfig;
try {
  config = resolveConfig(process.env, {
    serviceName: argv.service,
    host: argv.host,
    port: argv.port,
    logLevel: argv.logLevel === undefined ? undefined : parseLogLevel(argv.logLevel, "--log-level"),
  });
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`Invalid configuration: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

// --- Route to subcommands ---

const [command] = argv._;
const peer = typeof argv.peer === "string" ? argv.peer : undefined;

try {
  if (argv.version) {
    const { runVersion } = await import("./commands/version.js");
    await runVersion();
  } else if (command === "peers") {
    const { runPeers } = await import("./commands/peers.js");
    runPeers(createLink(config).adapter);
  } else if (command === "doctor") {
    const { runDoctor } = await import("./commands/doctor.js");
    await runDoctor(config, createLink(config).adapter);
  } else if (!argv.tui) {
    const { runHeadless } = await import("./commands/headless.js");
    await runHeadless(createLink(config), { connectTo: peer });
  } else {
    const { runMonitor } = await import("./commands/monitor.js");
    // Route logs away from the Ink frame unless asked for.
    const quiet = process.env["LINKMUX_LOG_LEVEL"] === undefined && argv.logLevel === undefined;
    await runMonitor(createLink(quiet ? { ...config, logLevel: "silent" } : config), {
      connectTo: peer,
    });
  }
} catch (err) {
  process.exitCode = 1;
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write((isLinkError(err) ? `${err.code}: ${message}` : message) + "\n");
}
