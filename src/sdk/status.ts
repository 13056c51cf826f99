/**
 * Connection status values published by the ConnectionManager.
 *
 * @module
 */

import type { PeerId } from "./channel/channel.js";

/** Exactly one current value at any time. */
export type ConnectionStatus =
  | { readonly kind: "disconnected"; readonly peerId?: PeerId }
  | { readonly kind: "waitingForConnection" }
  | { readonly kind: "connected"; readonly peerId: PeerId }
  | { readonly kind: "connectionError" };

export type ConnectionStatusKind = ConnectionStatus["kind"];

/** Socket-level phase of the manager's state machine. */
export type ManagerPhase = "idle" | "listening" | "connected" | "disconnected" | "error";

export const Status = {
  disconnected: (peerId?: PeerId): ConnectionStatus =>
    peerId === undefined ? { kind: "disconnected" } : { kind: "disconnected", peerId },
  waiting: (): ConnectionStatus => ({ kind: "waitingForConnection" }),
  connected: (peerId: PeerId): ConnectionStatus => ({ kind: "connected", peerId }),
  error: (): ConnectionStatus => ({ kind: "connectionError" }),
} as const;

function peerOf(status: ConnectionStatus): PeerId | undefined {
  return status.kind === "connected" || status.kind === "disconnected" ? status.peerId : undefined;
}

/** Two statuses are equal when kind and peer match. */
export function statusEquals(a: ConnectionStatus, b: ConnectionStatus): boolean {
  return a.kind === b.kind && peerOf(a) === peerOf(b);
}

/** Human-readable one-liner. */
export function describeStatus(status: ConnectionStatus): string {
  switch (status.kind) {
    case "disconnected":
      return status.peerId ? `disconnected from ${status.peerId}` : "disconnected";
    case "waitingForConnection":
      return "waiting for connection";
    case "connected":
      return `connected to ${status.peerId}`;
    case "connectionError":
      return "connection error";
  }
}
