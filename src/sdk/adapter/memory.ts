/**
 * Scriptable in-memory adapter for deterministic tests and demos.
 *
 * Every `listenOnce` / `connectTo` call parks until the test resolves it with
 * {@link MemoryAdapter.accept} / {@link MemoryAdapter.resolveConnect} or fails
 * it. Radio state, link events and profile callbacks are driven by hand.
 */

import type { Disposable, DuplexChannel, PeerId } from "../channel/channel.js";
import { TransportError } from "../errors.js";
import type {
  AdapterFacade,
  AttemptOptions,
  LinkEvent,
  PeerInfo,
  ProfileListener,
} from "./adapter.js";

interface PendingAttempt<R> {
  readonly target: string;
  readonly resolve: (channel: DuplexChannel<R>) => void;
  readonly reject: (error: Error) => void;
}

export interface MemoryAdapterOptions {
  radioEnabled?: boolean;
  peers?: readonly PeerInfo[];
  missingPermissions?: readonly string[];
  /** Profiles for which openProfile succeeds. */
  profiles?: readonly number[];
}

export class MemoryAdapter<R = unknown> implements AdapterFacade<R> {
  /** Service names passed to listenOnce, in call order. */
  readonly listenCalls: string[] = [];
  /** Peers passed to connectTo, in call order. */
  readonly connectCalls: PeerId[] = [];
  /** Profiles released through closeProfile. */
  readonly closedProfiles: number[] = [];

  readonly #radioHandlers = new Set<(enabled: boolean) => void>();
  readonly #linkHandlers = new Set<(event: LinkEvent) => void>();
  readonly #listens: PendingAttempt<R>[] = [];
  readonly #connects: PendingAttempt<R>[] = [];
  readonly #profileListeners = new Map<number, ProfileListener>();
  readonly #profiles: ReadonlySet<number>;
  #radioEnabled: boolean;
  #peers: readonly PeerInfo[];
  #missing: readonly string[];

  constructor(opts: MemoryAdapterOptions = {}) {
    this.#radioEnabled = opts.radioEnabled ?? true;
    this.#peers = opts.peers ?? [];
    this.#missing = opts.missingPermissions ?? [];
    this.#profiles = new Set(opts.profiles ?? []);
  }

  // ── AdapterFacade ────────────────────────────────────────────────

  isRadioEnabled(): boolean {
    return this.#radioEnabled;
  }

  onRadioChange(listener: (enabled: boolean) => void): Disposable {
    this.#radioHandlers.add(listener);
    return { dispose: () => this.#radioHandlers.delete(listener) };
  }

  onLinkEvent(listener: (event: LinkEvent) => void): Disposable {
    this.#linkHandlers.add(listener);
    return { dispose: () => this.#linkHandlers.delete(listener) };
  }

  bondedPeers(): readonly PeerInfo[] {
    return this.#peers;
  }

  missingPermissions(): readonly string[] {
    return this.#missing;
  }

  listenOnce(serviceName: string, opts: AttemptOptions = {}): Promise<DuplexChannel<R>> {
    this.listenCalls.push(serviceName);
    return this.#park(this.#listens, serviceName, opts.signal);
  }

  connectTo(peerId: PeerId, opts: AttemptOptions = {}): Promise<DuplexChannel<R>> {
    this.connectCalls.push(peerId);
    return this.#park(this.#connects, peerId, opts.signal);
  }

  openProfile(profile: number, listener: ProfileListener): boolean {
    if (!this.#profiles.has(profile)) return false;
    this.#profileListeners.set(profile, listener);
    return true;
  }

  closeProfile(profile: number): void {
    this.#profileListeners.delete(profile);
    this.closedProfiles.push(profile);
  }

  // ── Scripting ────────────────────────────────────────────────────

  /** Listen attempts still waiting. */
  get pendingListens(): number {
    return this.#listens.length;
  }

  /** Connect attempts still waiting. */
  get pendingConnects(): number {
    return this.#connects.length;
  }

  setRadioEnabled(enabled: boolean): void {
    this.#radioEnabled = enabled;
    for (const handler of this.#radioHandlers) handler(enabled);
  }

  setPeers(peers: readonly PeerInfo[]): void {
    this.#peers = peers;
  }

  setMissingPermissions(missing: readonly string[]): void {
    this.#missing = missing;
  }

  emitLink(event: LinkEvent): void {
    for (const handler of this.#linkHandlers) handler(event);
  }

  emitProfile(profile: number, state: "connected" | "disconnected"): void {
    const listener = this.#profileListeners.get(profile);
    if (state === "connected") {
      listener?.onServiceConnected(profile);
    } else {
      listener?.onServiceDisconnected(profile);
    }
  }

  /** Complete the oldest pending listen with `channel`. */
  accept(channel: DuplexChannel<R>): void {
    this.#take(this.#listens, "listen").resolve(channel);
  }

  /** Fail the oldest pending listen. */
  failListen(error: Error = new TransportError("Accept failed")): void {
    this.#take(this.#listens, "listen").reject(error);
  }

  /** Complete the oldest pending connect with `channel`. */
  resolveConnect(channel: DuplexChannel<R>): void {
    this.#take(this.#connects, "connect").resolve(channel);
  }

  /** Fail the oldest pending connect. */
  failConnect(error: Error = new TransportError("Connect failed")): void {
    this.#take(this.#connects, "connect").reject(error);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  #park(
    queue: PendingAttempt<R>[],
    target: string,
    signal: AbortSignal | undefined,
  ): Promise<DuplexChannel<R>> {
    return new Promise<DuplexChannel<R>>((resolve, reject) => {
      const entry: PendingAttempt<R> = { target, resolve, reject };
      if (signal?.aborted) {
        reject(new TransportError(`Attempt for ${target} cancelled`));
        return;
      }
      queue.push(entry);
      signal?.addEventListener(
        "abort",
        () => {
          const idx = queue.indexOf(entry);
          if (idx >= 0) queue.splice(idx, 1);
          reject(new TransportError(`Attempt for ${target} cancelled`));
        },
        { once: true },
      );
    });
  }

  #take(queue: PendingAttempt<R>[], kind: string): PendingAttempt<R> {
    const entry = queue.shift();
    if (!entry) throw new Error(`No pending ${kind} attempt`);
    return entry;
  }
}
