/**
 * StreamMultiplexer: one duplex channel, several shareable streams.
 *
 * Wraps a {@link DuplexChannel} and exposes it as a byte stream, delimited
 * text streams, and a record stream. Each reader kind runs at most one read
 * loop for the lifetime of the multiplexer; any number of consumers share
 * it. Writes are serialized against each other but never wait on reads.
 *
 * The multiplexer owns the channel. A read or write failure marks it dead
 * and closes the channel; `close()` does the same from the local side.
 *
 * @example
 * ```ts
 * const mux = new StreamMultiplexer(channel);
 * for await (const line of mux.textStream()) {
 *   if (line === "PING") await mux.send("PONG\r\n");
 * }
 * ```
 */
import { TextDecoder } from "node:util";

import type { Disposable, DuplexChannel, PeerId } from "./channel/channel.js";
import { HotStream, type StreamSink } from "./hot-stream.js";
import { WriteQueue } from "./write-queue.js";
import { classifyError, type LinkError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export const CR = 0x0d;
export const LF = 0x0a;

/** Delimiters used by {@link StreamMultiplexer.textStream} when none are given. */
export const DEFAULT_DELIMITERS: readonly number[] = [CR, LF];

/** Lifecycle state. `failed` and `closed` are terminal. */
export type MultiplexerState = "open" | "failed" | "closed";

export interface MultiplexerOptions {
  logger?: Logger;
}

type ReaderKind = "byte" | "record";

const encoder = new TextEncoder();

export class StreamMultiplexer<R = unknown> {
  readonly #channel: DuplexChannel<R>;
  readonly #log: Logger;
  readonly #writes = new WriteQueue();
  readonly #closeHandlers = new Set<(reason?: LinkError) => void>();
  #bytes: HotStream<number> | null = null;
  #records: HotStream<R> | null = null;
  #state: MultiplexerState = "open";
  #failure: LinkError | undefined;

  constructor(channel: DuplexChannel<R>, opts: MultiplexerOptions = {}) {
    this.#channel = channel;
    this.#log = (opts.logger ?? silentLogger).child("mux");
  }

  /** Current lifecycle state. */
  get state(): MultiplexerState {
    return this.#state;
  }

  /** Whether the channel is still usable. */
  get open(): boolean {
    return this.#state === "open";
  }

  /** The failure that killed the channel, if any. */
  get failure(): LinkError | undefined {
    return this.#failure;
  }

  /** The peer on the other end of the channel. */
  get peer(): PeerId {
    return this.#channel.remotePeer;
  }

  // ── Streams ────────────────────────────────────────────────────

  /**
   * Bytes as they are read, one emission per byte. The read loop starts with
   * the first subscription and is shared by every later one.
   */
  byteStream(): HotStream<number> {
    if (this.#state !== "open") return this.#deadStream();
    this.#bytes ??= this.#readerStream("byte", () => this.#channel.readByte());
    return this.#bytes;
  }

  /** Records decoded by the channel. Same sharing rules as {@link byteStream}. */
  recordStream(): HotStream<R> {
    if (this.#state !== "open") return this.#deadStream();
    this.#records ??= this.#readerStream("record", () => this.#channel.readRecord());
    return this.#records;
  }

  /**
   * Text segmented on any byte in `delimiters`. Every delimiter byte closes a
   * segment, so `"AB\r\nCD"` yields `"AB"`, `""`, then `"CD"` once the
   * stream ends. A pending segment is flushed once before completion or
   * failure is propagated.
   */
  textStream(
    delimiters: Iterable<number> = DEFAULT_DELIMITERS,
    encoding: string = "utf-8",
  ): HotStream<string> {
    const boundaries = new Set(delimiters);
    if (boundaries.size === 0) {
      throw new RangeError("textStream needs at least one delimiter byte");
    }
    const decoder = new TextDecoder(encoding);
    const source = this.byteStream();
    return new HotStream<string>((sink) => segment(source, boundaries, decoder, sink));
  }

  // ── Writing ────────────────────────────────────────────────────

  /** Send raw bytes, or text encoded as UTF-8. */
  send(data: Uint8Array | string): Promise<boolean> {
    const bytes = typeof data === "string" ? encoder.encode(data) : data;
    return this.#write("bytes", () => this.#channel.write(bytes));
  }

  /** Send a single byte. */
  sendByte(byte: number): Promise<boolean> {
    return this.send(Uint8Array.of(byte & 0xff));
  }

  /** Send a record through the channel's own encoding. */
  sendRecord(record: R): Promise<boolean> {
    return this.#write("record", () => this.#channel.writeRecord(record));
  }

  // ── Lifecycle ──────────────────────────────────────────────────

  /** Register a handler for the channel going away. Fires once. */
  onClose(handler: (reason?: LinkError) => void): Disposable {
    if (this.#state !== "open") {
      handler(this.#failure);
      return { dispose: () => {} };
    }
    this.#closeHandlers.add(handler);
    return { dispose: () => this.#closeHandlers.delete(handler) };
  }

  /** Close the channel and end every stream. Idempotent, never throws. */
  close(): void {
    if (this.#state !== "open") return;
    this.#state = "closed";
    this.#log.info("Closing channel", { peer: this.peer });
    this.#shutdown(undefined);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  #readerStream<T>(kind: ReaderKind, read: () => Promise<T>): HotStream<T> {
    return new HotStream<T>((sink) => {
      this.#log.debug("Reader loop started", { kind, peer: this.peer });
      void this.#readLoop(read, sink).catch((err: unknown) => {
        this.#log.error("Reader loop crashed", err);
        this.#fail(classifyError(err));
      });
    });
  }

  /**
   * Pump `read` into `sink` until the multiplexer dies. A read that was
   * already in flight when the channel closed is dropped, and no further
   * read is issued.
   */
  async #readLoop<T>(read: () => Promise<T>, sink: StreamSink<T>): Promise<void> {
    while (this.#state === "open" && !sink.closed) {
      let value: T;
      try {
        value = await read();
      } catch (err) {
        this.#fail(classifyError(err));
        return;
      }
      if (this.#state !== "open" || sink.closed) return;
      sink.next(value);
    }
  }

  async #write(kind: "bytes" | "record", op: () => Promise<void>): Promise<boolean> {
    if (this.#state !== "open") return false;

    return this.#writes.run(async () => {
      if (this.#state !== "open") return false;
      try {
        await op();
        return true;
      } catch (err) {
        const error = classifyError(err);
        this.#log.error("Write failed", { kind, peer: this.peer, reason: error.message });
        this.#fail(error);
        return false;
      }
    });
  }

  #fail(error: LinkError): void {
    if (this.#state !== "open") return;
    this.#state = "failed";
    this.#failure = error;
    this.#log.warn("Channel failed", { peer: this.peer, code: error.code, reason: error.message });
    this.#shutdown(error);
  }

  /** Clear cached streams first so live loops see the state change, then release. */
  #shutdown(reason: LinkError | undefined): void {
    const streams = [this.#bytes, this.#records];
    this.#bytes = null;
    this.#records = null;

    this.#closeChannel();

    for (const stream of streams) {
      stream?.terminate(reason);
    }

    const handlers = [...this.#closeHandlers];
    this.#closeHandlers.clear();
    for (const handler of handlers) {
      handler(reason);
    }
  }

  #closeChannel(): void {
    const ignore = (err: unknown) => this.#log.debug("Ignoring error while closing channel", err);
    try {
      const pending = this.#channel.close();
      if (pending) void pending.catch(ignore);
    } catch (err) {
      ignore(err);
    }
  }

  #deadStream<T>(): HotStream<T> {
    return this.#failure ? HotStream.failed<T>(this.#failure) : HotStream.completed<T>();
  }
}

/** Split a byte stream into text segments on delimiter bytes. */
function segment(
  source: HotStream<number>,
  delimiters: ReadonlySet<number>,
  decoder: TextDecoder,
  sink: StreamSink<string>,
): () => void {
  let buffer: number[] = [];

  const emit = () => {
    sink.next(decoder.decode(Uint8Array.from(buffer)));
    buffer = [];
  };

  const sub = source.subscribe({
    next: (byte) => {
      if (delimiters.has(byte)) {
        emit();
      } else {
        buffer.push(byte);
      }
    },
    error: (error) => {
      if (buffer.length > 0) emit();
      sink.error(error);
    },
    complete: () => {
      if (buffer.length > 0) emit();
      sink.complete();
    },
  });

  return () => sub.dispose();
}
