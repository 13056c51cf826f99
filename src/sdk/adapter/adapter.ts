/**
 * Contract the connection core expects from the platform radio.
 *
 * Implementations bridge whatever callback or broadcast mechanism the host
 * offers into plain listener registration with a {@link Disposable}.
 */

import type { Disposable, DuplexChannel, PeerId } from "../channel/channel.js";

/** Lower-layer link notification, independent of the socket lifecycle. */
export interface LinkEvent {
  readonly kind: "connected" | "disconnectRequested" | "disconnected";
  readonly peerId: PeerId;
}

/** A paired peer known to the adapter. */
export interface PeerInfo {
  readonly id: PeerId;
  readonly name?: string;
}

/** Options for the asynchronous socket-producing operations. */
export interface AttemptOptions {
  /** Aborting cancels the attempt; the returned promise then rejects. */
  signal?: AbortSignal;
}

/** State change reported by a profile proxy. */
export interface ServiceEvent {
  readonly state: "connected" | "disconnected";
  readonly profile: number;
}

export interface ProfileListener {
  onServiceConnected(profile: number): void;
  onServiceDisconnected(profile: number): void;
}

export interface AdapterFacade<R = unknown> {
  /** Current radio state. */
  isRadioEnabled(): boolean;

  /** Register for radio state changes. Only changes are reported. */
  onRadioChange(listener: (enabled: boolean) => void): Disposable;

  /** Register for link-layer connect/disconnect events. */
  onLinkEvent(listener: (event: LinkEvent) => void): Disposable;

  /** Peers paired with the local adapter. */
  bondedPeers(): readonly PeerInfo[];

  /** Listen under `serviceName`, accept exactly one inbound connection, stop listening. */
  listenOnce(serviceName: string, opts?: AttemptOptions): Promise<DuplexChannel<R>>;

  /** Open an outbound connection to `peerId`. */
  connectTo(peerId: PeerId, opts?: AttemptOptions): Promise<DuplexChannel<R>>;

  /** Permission identifiers still missing. Empty means authorized. */
  missingPermissions(): readonly string[];

  /** Ask for a profile proxy. Returns false when the request cannot be made. */
  openProfile?(profile: number, listener: ProfileListener): boolean;

  /** Release a proxy obtained through {@link openProfile}. */
  closeProfile?(profile: number): void;
}

/**
 * Observe the radio as a single signal: the current value first, then every
 * change. Consecutive duplicates are dropped.
 */
export function observeRadio(
  adapter: Pick<AdapterFacade, "isRadioEnabled" | "onRadioChange">,
  listener: (enabled: boolean) => void,
): Disposable {
  let last: boolean | undefined;
  const emit = (enabled: boolean) => {
    if (enabled === last) return;
    last = enabled;
    listener(enabled);
  };

  const sub = adapter.onRadioChange(emit);
  emit(adapter.isRadioEnabled());
  return sub;
}
