/**
 * `linkmux peers`: list bonded peers.
 */
import type { AdapterFacade } from "../sdk/adapter/adapter.js";

export function runPeers(adapter: Pick<AdapterFacade, "bondedPeers">): void {
  const peers = adapter.bondedPeers();

  if (peers.length === 0) {
    console.log("No bonded peers. Add some with LINKMUX_PEERS=name=host:port,…");
    return;
  }

  const width = Math.max(...peers.map((p) => (p.name ?? "").length));
  for (const peer of peers) {
    console.log(`  ${(peer.name ?? "").padEnd(width)}  ${peer.id}`);
  }
}
