/**
 * ConnectionManager: listen/connect arbitration for a single link.
 *
 * Owns zero or one active {@link StreamMultiplexer}. Reacts to radio and
 * link-layer events from the adapter, arms a listen-once loop when idle,
 * and publishes a single distinct-change connection status.
 *
 * Every transition runs synchronously on the event loop, so each one is its
 * own critical section. Listen and connect attempts carry an identity token;
 * a channel produced by an attempt that has since been cancelled is closed
 * and ignored.
 *
 * @example
 * ```ts
 * const manager = new ConnectionManager({ adapter, serviceName: "linkmux" });
 * manager.connectionState.subscribe((status) => console.log(describeStatus(status)));
 * manager.start();
 *
 * for await (const record of manager.incomingData) {
 *   console.log(record);
 * }
 * ```
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { Disposable, DuplexChannel, PeerId } from "./channel/channel.js";
import { observeRadio, type AdapterFacade, type LinkEvent } from "./adapter/adapter.js";
import { StreamMultiplexer } from "./multiplexer.js";
import { HotStream, type StreamSink } from "./hot-stream.js";
import {
  classifyError,
  ManagerClosedError,
  PermissionDeniedError,
  TransportClosedError,
  type LinkError,
} from "./errors.js";
import {
  Status,
  describeStatus,
  statusEquals,
  type ConnectionStatus,
  type ManagerPhase,
} from "./status.js";
import { silentLogger, type Logger } from "./logger.js";

// ── Types ────────────────────────────────────────────────────────────

/** Everything the manager knows, as one immutable snapshot. */
export interface LinkSnapshot {
  readonly status: ConnectionStatus;
  readonly phase: ManagerPhase;
  readonly boundPeer: PeerId | null;
  readonly radioEnabled: boolean;
  readonly lastError: LinkError | null;
}

/** Read-only view of the snapshot store. */
export type LinkStore = Pick<StoreApi<LinkSnapshot>, "getState" | "getInitialState" | "subscribe">;

/** A value with change notifications. */
export interface StateSignal<T> {
  readonly current: T;
  /** Called for each new value. Consecutive equal values are never reported. */
  subscribe(listener: (value: T) => void): Disposable;
}

export interface ConnectionManagerOptions<R> {
  adapter: AdapterFacade<R>;
  /** Service name advertised while listening. */
  serviceName: string;
  logger?: Logger;
}

interface ActiveConnection<R> {
  readonly mux: StreamMultiplexer<R>;
  readonly peerId: PeerId;
  readonly relay: Disposable;
}

interface Attempt {
  readonly controller: AbortController;
}

// ── Manager ──────────────────────────────────────────────────────────

export class ConnectionManager<R = unknown> {
  /** Distinct-change connection status. */
  readonly connectionState: StateSignal<ConnectionStatus>;
  /** Records from whichever connection is active. Never fails; completes on close(). */
  readonly incomingData: HotStream<R>;

  readonly #adapter: AdapterFacade<R>;
  readonly #serviceName: string;
  readonly #log: Logger;
  readonly #store: StoreApi<LinkSnapshot>;
  #incomingSink: StreamSink<R> | null = null;
  #active: ActiveConnection<R> | null = null;
  #listenAttempt: Attempt | null = null;
  #connectAttempt: Attempt | null = null;
  #subscriptions: Disposable[] = [];
  #started = false;
  #closed = false;

  constructor(opts: ConnectionManagerOptions<R>) {
    this.#adapter = opts.adapter;
    this.#serviceName = opts.serviceName;
    this.#log = (opts.logger ?? silentLogger).child("manager");

    const store = createStore<LinkSnapshot>()(() => ({
      status: Status.disconnected(),
      phase: "idle",
      boundPeer: null,
      radioEnabled: false,
      lastError: null,
    }));
    this.#store = store;

    this.connectionState = {
      get current() {
        return store.getState().status;
      },
      subscribe: (listener) => ({
        dispose: store.subscribe((state, prev) => {
          if (state.status !== prev.status) listener(state.status);
        }),
      }),
    };

    this.incomingData = new HotStream<R>((sink) => {
      this.#incomingSink = sink;
    });
  }

  // ── Accessors ────────────────────────────────────────────────────

  /** Snapshot store, for UI bindings. */
  get store(): LinkStore {
    return this.#store;
  }

  get phase(): ManagerPhase {
    return this.#store.getState().phase;
  }

  /** Whether the published status is `connected`. */
  get isConnected(): boolean {
    return this.#store.getState().status.kind === "connected";
  }

  /** Peer the manager is currently bound to, if any. */
  get boundPeer(): PeerId | null {
    return this.#store.getState().boundPeer;
  }

  /** Multiplexer of the active connection. */
  get multiplexer(): StreamMultiplexer<R> | null {
    return this.#active?.mux ?? null;
  }

  // ── Operations ───────────────────────────────────────────────────

  /** Subscribe to radio and link events. Idempotent. */
  start(): void {
    if (this.#closed) throw new ManagerClosedError();
    if (this.#started) return;
    this.#started = true;
    this.#log.debug("Starting", { service: this.#serviceName });

    this.#subscriptions.push(
      this.#adapter.onLinkEvent((event) => this.#onLinkEvent(event)),
      observeRadio(this.#adapter, (enabled) => this.#onRadio(enabled)),
    );
  }

  /**
   * Connect out to `peerId`. Rejects only with {@link PermissionDeniedError};
   * transport failures are published as `connectionError`.
   */
  async connect(peerId: PeerId): Promise<void> {
    if (this.#closed) throw new ManagerClosedError();

    const missing = this.#adapter.missingPermissions();
    if (missing.length > 0) throw new PermissionDeniedError(missing);

    if (this.#active?.peerId === peerId) return;

    this.#cancelAttempts();
    const dropped = this.#dropActive();
    if (dropped) {
      this.#transition("disconnected", Status.disconnected(dropped.peerId), { boundPeer: null });
    }

    const attempt: Attempt = { controller: new AbortController() };
    this.#connectAttempt = attempt;
    this.#log.info("Connecting", { peer: peerId });

    let channel: DuplexChannel<R>;
    try {
      channel = await this.#adapter.connectTo(peerId, { signal: attempt.controller.signal });
    } catch (err) {
      if (this.#connectAttempt !== attempt) return;
      this.#connectAttempt = null;
      const error = classifyError(err);
      this.#log.warn("Connect failed", { peer: peerId, reason: error.message });
      this.#transition("error", Status.error(), { lastError: error });
      return;
    }

    if (this.#connectAttempt !== attempt || this.#closed) {
      this.#log.debug("Discarding channel from a cancelled connect", { peer: peerId });
      closeQuietly(channel, this.#log);
      return;
    }
    this.#connectAttempt = null;
    const replaced = this.#dropActive();
    if (replaced) {
      this.#transition("disconnected", Status.disconnected(replaced.peerId), { boundPeer: null });
    }
    this.#bind(channel, peerId);
  }

  /** Arm the listen loop unless already connected or listening. */
  listen(): void {
    if (this.#closed) throw new ManagerClosedError();
    this.#armListening();
  }

  /** Drop the active connection and stop listening. Idempotent. */
  disconnect(): void {
    this.#cancelAttempts();
    this.#dropActive();
    this.#transition("idle", Status.disconnected(), { boundPeer: null });
  }

  /** Send a record over the active connection. */
  async send(record: R): Promise<boolean> {
    const active = this.#active;
    if (!active) return false;
    return active.mux.sendRecord(record);
  }

  /** Send raw bytes, or UTF-8 text, over the active connection. */
  async sendRaw(data: Uint8Array | string): Promise<boolean> {
    const active = this.#active;
    if (!active) return false;
    return active.mux.send(data);
  }

  /** Tear everything down. The manager cannot be restarted. */
  close(): void {
    if (this.#closed) return;
    this.disconnect();
    this.#closed = true;
    for (const sub of this.#subscriptions) sub.dispose();
    this.#subscriptions = [];
    this.incomingData.terminate();
    this.#incomingSink = null;
  }

  // ---------------------------------------------------------------------------
  // Event reactions
  // ---------------------------------------------------------------------------

  #onRadio(enabled: boolean): void {
    this.#store.setState({ radioEnabled: enabled });

    if (enabled) {
      this.#log.info("Radio enabled");
      if (!this.#active) this.#armListening();
      return;
    }

    this.#log.info("Radio disabled");
    this.#cancelAttempts();
    this.#dropActive();
    this.#transition("idle", Status.disconnected(), { boundPeer: null });
  }

  #onLinkEvent(event: LinkEvent): void {
    switch (event.kind) {
      case "connected": {
        const active = this.#active;
        if (active && active.peerId !== event.peerId) {
          this.#log.debug("Ignoring link-up for a second peer", { peer: event.peerId });
          return;
        }
        this.#log.info("Link connected", { peer: event.peerId });
        this.#transition(this.phase, Status.connected(event.peerId), { boundPeer: event.peerId });
        return;
      }

      case "disconnectRequested":
        this.#log.debug("Link disconnect requested", { peer: event.peerId });
        return;

      case "disconnected": {
        if (this.boundPeer !== event.peerId) {
          this.#log.debug("Ignoring link-down for unbound peer", { peer: event.peerId });
          return;
        }
        this.#log.info("Link disconnected", { peer: event.peerId });
        this.#dropActive();
        this.#transition("disconnected", Status.disconnected(event.peerId), { boundPeer: null });
        this.#armListening();
        return;
      }
    }
  }

  #onAccepted(attempt: Attempt, channel: DuplexChannel<R>): void {
    if (this.#listenAttempt !== attempt || this.#closed || this.#active) {
      this.#log.debug("Discarding channel from a cancelled listen", { peer: channel.remotePeer });
      closeQuietly(channel, this.#log);
      return;
    }
    this.#listenAttempt = null;
    this.#bind(channel, channel.remotePeer);
  }

  #onListenFailed(attempt: Attempt, err: unknown): void {
    if (this.#listenAttempt !== attempt) return;
    this.#listenAttempt = null;
    const error = classifyError(err);
    this.#log.warn("Listen failed", { service: this.#serviceName, reason: error.message });
    this.#transition("error", Status.error(), { lastError: error });
  }

  /** The active multiplexer died on its own. */
  #onChannelLost(mux: StreamMultiplexer<R>, reason: LinkError | undefined): void {
    const active = this.#active;
    if (active?.mux !== mux) return;

    this.#active = null;
    active.relay.dispose();

    if (reason === undefined || reason instanceof TransportClosedError) {
      this.#log.info("Channel closed", { peer: active.peerId });
      this.#transition("disconnected", Status.disconnected(active.peerId), { boundPeer: null });
    } else {
      this.#log.warn("Channel failed", { peer: active.peerId, reason: reason.message });
      this.#transition("error", Status.error(), { boundPeer: null, lastError: reason });
    }
    this.#armListening();
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  #armListening(): void {
    if (this.#closed || this.#active || this.#connectAttempt) return;

    // An accept is already pending: only the published state may lag behind.
    if (this.#listenAttempt) {
      if (this.phase !== "listening") this.#transition("listening", Status.waiting());
      return;
    }

    if (!this.#store.getState().radioEnabled) {
      this.#transition("idle");
      return;
    }

    const attempt: Attempt = { controller: new AbortController() };
    this.#listenAttempt = attempt;
    this.#log.info("Listening", { service: this.#serviceName });
    this.#transition("listening", Status.waiting());

    void this.#adapter
      .listenOnce(this.#serviceName, { signal: attempt.controller.signal })
      .then(
        (channel) => this.#onAccepted(attempt, channel),
        (err: unknown) => this.#onListenFailed(attempt, err),
      );
  }

  #bind(channel: DuplexChannel<R>, peerId: PeerId): void {
    const mux = new StreamMultiplexer<R>(channel, { logger: this.#log });
    const relay = mux.recordStream().subscribe({
      next: (record) => {
        if (this.#active?.mux === mux) this.#incomingSink?.next(record);
      },
    });

    this.#active = { mux, peerId, relay };
    mux.onClose((reason) => this.#onChannelLost(mux, reason));
    if (this.#active?.mux !== mux) return;

    this.#transition("connected", Status.connected(peerId), { boundPeer: peerId, lastError: null });
  }

  /** Close the active connection without publishing anything. */
  #dropActive(): ActiveConnection<R> | null {
    const active = this.#active;
    if (!active) return null;

    this.#active = null;
    active.relay.dispose();
    this.incomingData.discardBuffered();
    active.mux.close();
    return active;
  }

  #cancelAttempts(): void {
    const listen = this.#listenAttempt;
    const connect = this.#connectAttempt;
    this.#listenAttempt = null;
    this.#connectAttempt = null;
    listen?.controller.abort();
    connect?.controller.abort();
  }

  /** Move to `phase`; publish `status` only when it differs from the current one. */
  #transition(phase: ManagerPhase, status?: ConnectionStatus, patch: Partial<LinkSnapshot> = {}): void {
    const current = this.#store.getState();
    if (status && !statusEquals(current.status, status)) {
      this.#log.info(`Status: ${describeStatus(status)}`);
      this.#store.setState({ ...patch, phase, status });
    } else {
      this.#store.setState({ ...patch, phase });
    }
  }
}

/** Close a channel nobody will own. Errors are logged, never raised. */
function closeQuietly<R>(channel: DuplexChannel<R>, log: Logger): void {
  const ignore = (err: unknown) => log.debug("Ignoring error while closing channel", err);
  try {
    const pending = channel.close();
    if (pending) void pending.catch(ignore);
  } catch (err) {
    ignore(err);
  }
}
