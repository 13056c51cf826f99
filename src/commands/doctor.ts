/**
 * `linkmux doctor`: check that a link can be brought up here.
 */
import { createServer } from "node:net";
import type { AdapterFacade } from "../sdk/adapter/adapter.js";
import type { LinkConfig } from "../sdk/config.js";

/** Resolve true if `host:port` can be bound right now. */
export function probeListenAddress(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.once("error", () => resolve(false));
    server.listen(port, host, () => {
      server.close(() => resolve(true));
    });
  });
}

export async function runDoctor(
  config: LinkConfig,
  adapter: Pick<AdapterFacade, "missingPermissions" | "isRadioEnabled" | "bondedPeers">,
  probe: (host: string, port: number) => Promise<boolean> = probeListenAddress,
): Promise<void> {
  let allOk = true;

  // 1. Configuration
  console.log(`Configuration ....... ✓ service "${config.serviceName}" on ${config.host}:${config.port}`);

  // 2. Permissions
  process.stdout.write("Permissions ......... ");
  const missing = adapter.missingPermissions();
  if (missing.length === 0) {
    console.log("✓ granted");
  } else {
    console.log(`✗ missing ${missing.join(", ")}`);
    allOk = false;
  }

  // 3. Radio
  process.stdout.write("Radio ............... ");
  if (adapter.isRadioEnabled()) {
    console.log("✓ enabled");
  } else {
    console.log("✗ disabled");
    allOk = false;
  }

  // 4. Listen address
  process.stdout.write("Listen address ...... ");
  if (await probe(config.host, config.port)) {
    console.log(`✓ ${config.host}:${config.port} available`);
  } else {
    console.log(`✗ ${config.host}:${config.port} in use or not bindable`);
    console.log("  Set LINKMUX_HOST / LINKMUX_PORT or pass --host / --port.");
    allOk = false;
  }

  // 5. Bonded peers (informational)
  const peers = adapter.bondedPeers();
  console.log(`Bonded peers ........ ${peers.length === 0 ? "none" : peers.length}`);

  if (allOk) {
    console.log("\nAll checks passed.");
  } else {
    console.log("\nSome checks failed.");
    process.exitCode = 1;
  }
}
