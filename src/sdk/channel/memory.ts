/**
 * In-memory channel pair for deterministic testing.
 *
 * Bytes and records written on one side become readable on the other via
 * queueMicrotask, giving async-like ordering without real I/O. Records are
 * copied with structuredClone, as a serializing transport would.
 */

import type { DuplexChannel, PeerId } from "./channel.js";
import { TransportClosedError } from "../errors.js";

/**
 * Create a linked pair of in-memory channels. Each side reports the other's
 * id as its `remotePeer`.
 */
export function createMemoryChannel<R = unknown>(
  ids: { a?: PeerId; b?: PeerId } = {},
): [MemoryChannel<R>, MemoryChannel<R>] {
  const aToB = new Mailbox<R>();
  const bToA = new Mailbox<R>();
  const a = new MemoryChannel<R>(ids.b ?? "memory-b", bToA, aToB);
  const b = new MemoryChannel<R>(ids.a ?? "memory-a", aToB, bToA);
  return [a, b];
}

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/** One direction of the pair. @internal */
export class Mailbox<R> {
  readonly #bytes: number[] = [];
  readonly #records: Array<{ record: R }> = [];
  readonly #byteWaiters: Waiter<number>[] = [];
  readonly #recordWaiters: Waiter<R>[] = [];
  #closed: TransportClosedError | null = null;

  get closed(): boolean {
    return this.#closed !== null;
  }

  pushBytes(data: Uint8Array): void {
    if (this.#closed) return;
    for (const byte of data) {
      const waiter = this.#byteWaiters.shift();
      if (waiter) {
        waiter.resolve(byte);
      } else {
        this.#bytes.push(byte);
      }
    }
  }

  pushRecord(record: R): void {
    if (this.#closed) return;
    const waiter = this.#recordWaiters.shift();
    if (waiter) {
      waiter.resolve(record);
    } else {
      this.#records.push({ record });
    }
  }

  takeByte(): Promise<number> {
    const byte = this.#bytes.shift();
    if (byte !== undefined) return Promise.resolve(byte);
    if (this.#closed) return Promise.reject(this.#closed);
    return new Promise((resolve, reject) => this.#byteWaiters.push({ resolve, reject }));
  }

  takeRecord(): Promise<R> {
    const item = this.#records.shift();
    if (item) return Promise.resolve(item.record);
    if (this.#closed) return Promise.reject(this.#closed);
    return new Promise((resolve, reject) => this.#recordWaiters.push({ resolve, reject }));
  }

  /** Stop accepting data. Queued data stays readable unless `discard` is set. */
  close(reason: TransportClosedError, discard: boolean): void {
    if (this.#closed) return;
    this.#closed = reason;
    if (discard) {
      this.#bytes.length = 0;
      this.#records.length = 0;
    }
    for (const waiter of this.#byteWaiters.splice(0)) waiter.reject(reason);
    for (const waiter of this.#recordWaiters.splice(0)) waiter.reject(reason);
  }
}

export class MemoryChannel<R = unknown> implements DuplexChannel<R> {
  readonly remotePeer: PeerId;
  readonly #inbound: Mailbox<R>;
  readonly #outbound: Mailbox<R>;
  #closeCount = 0;
  #closedLocally = false;

  /** @internal Use {@link createMemoryChannel} instead. */
  constructor(remotePeer: PeerId, inbound: Mailbox<R>, outbound: Mailbox<R>) {
    this.remotePeer = remotePeer;
    this.#inbound = inbound;
    this.#outbound = outbound;
  }

  /** Whether this side can no longer write. */
  get closed(): boolean {
    return this.#closedLocally || this.#outbound.closed;
  }

  /** How many times close() was called on this side. */
  get closeCount(): number {
    return this.#closeCount;
  }

  readByte(): Promise<number> {
    return this.#inbound.takeByte();
  }

  readRecord(): Promise<R> {
    return this.#inbound.takeRecord();
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.closed) throw new TransportClosedError("Cannot write to a closed channel");
    const copy = Uint8Array.from(data);
    const target = this.#outbound;
    queueMicrotask(() => target.pushBytes(copy));
  }

  async writeRecord(record: R): Promise<void> {
    if (this.closed) throw new TransportClosedError("Cannot write to a closed channel");
    const copy = structuredClone(record);
    const target = this.#outbound;
    queueMicrotask(() => target.pushRecord(copy));
  }

  /** Close both directions. The other side drains what was already sent. */
  close(): void {
    this.#closeCount++;
    this.#closedLocally = true;
    this.#inbound.close(new TransportClosedError("Channel closed locally"), true);
    const outbound = this.#outbound;
    queueMicrotask(() => outbound.close(new TransportClosedError("Peer closed the channel"), false));
  }
}
