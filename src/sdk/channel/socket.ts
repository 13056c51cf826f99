/**
 * Socket channel: a DuplexChannel over any Node.js Duplex stream (a
 * `net.Socket` in production, a hand-built Duplex in tests).
 *
 * Incoming bytes accumulate in one buffer shared by byte and record reads;
 * pending reads are served in arrival order. Records use the length-prefixed
 * JSON framing from `framing.ts`. Mixing byte and record reads on the same
 * channel is only meaningful if the peer writes accordingly.
 */

import type { Duplex } from "node:stream";
import type { DuplexChannel, PeerId } from "./channel.js";
import { decodeFrame, encodeFrame } from "./framing.js";
import { classifyError, TransportClosedError, type LinkError } from "../errors.js";

type Take<T> = (buffer: Buffer) => { value: T; size: number } | null;

export class SocketChannel implements DuplexChannel<unknown> {
  readonly remotePeer: PeerId;
  readonly #socket: Duplex;
  readonly #waiters: Array<() => boolean> = [];
  #buffer: Buffer = Buffer.alloc(0);
  #ended: LinkError | null = null;
  #closedLocally = false;

  constructor(socket: Duplex, remotePeer: PeerId) {
    this.#socket = socket;
    this.remotePeer = remotePeer;

    socket.on("data", (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      this.#buffer = this.#buffer.length === 0 ? bytes : Buffer.concat([this.#buffer, bytes]);
      this.#drain();
    });
    socket.on("end", () => this.#end(new TransportClosedError("Peer closed the channel")));
    socket.on("close", () => this.#end(new TransportClosedError("Channel closed")));
    socket.on("error", (err: Error) => this.#end(classifyError(err)));
  }

  /** Bytes received but not yet read. */
  get buffered(): number {
    return this.#buffer.length;
  }

  readByte(): Promise<number> {
    return this.#read((buffer) =>
      buffer.length > 0 ? { value: buffer.readUInt8(0), size: 1 } : null,
    );
  }

  readRecord(): Promise<unknown> {
    return this.#read(decodeFrame);
  }

  write(data: Uint8Array): Promise<void> {
    if (this.#closedLocally || this.#ended) {
      return Promise.reject(new TransportClosedError("Cannot write to a closed channel"));
    }
    return new Promise<void>((resolve, reject) => {
      this.#socket.write(data, (err) => {
        if (err) {
          reject(classifyError(err));
        } else {
          resolve();
        }
      });
    });
  }

  async writeRecord(record: unknown): Promise<void> {
    await this.write(encodeFrame(record));
  }

  close(): void {
    if (this.#closedLocally) return;
    this.#closedLocally = true;
    this.#socket.destroy();
    this.#drain();
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  /**
   * Queue a read. `take` inspects the buffer and returns the value plus how
   * many bytes it consumed, or null to keep waiting.
   */
  #read<T>(take: Take<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const attempt = (): boolean => {
        if (this.#closedLocally) {
          reject(new TransportClosedError("Channel closed locally"));
          return true;
        }
        let taken: { value: T; size: number } | null;
        try {
          taken = take(this.#buffer);
        } catch (err) {
          reject(classifyError(err));
          return true;
        }
        if (taken) {
          this.#buffer = this.#buffer.subarray(taken.size);
          resolve(taken.value);
          return true;
        }
        if (this.#ended) {
          reject(this.#ended);
          return true;
        }
        return false;
      };

      if (this.#waiters.length > 0 || !attempt()) {
        this.#waiters.push(attempt);
      }
    });
  }

  /** Serve waiting reads in order until one cannot be satisfied. */
  #drain(): void {
    while (this.#waiters.length > 0) {
      const [next] = this.#waiters;
      if (!next || !next()) return;
      this.#waiters.shift();
    }
  }

  #end(reason: LinkError): void {
    if (this.#ended) return;
    this.#ended = reason;
    this.#drain();
  }
}
