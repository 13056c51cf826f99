/**
 * HotStream: a lazily started, shared stream with any number of consumers.
 *
 * The producer is started by the first subscription and keeps running until
 * it signals completion or failure (or the owner terminates the stream).
 * Later subscribers attach to the live producer and only see values emitted
 * after they joined; nothing is replayed.
 *
 * Consumers either register an observer with `subscribe()` or iterate with
 * `for await...of`. Every iterator owns an unbounded queue, so the producer
 * never waits for a slow consumer.
 *
 * @example
 * ```ts
 * for await (const byte of mux.byteStream()) {
 *   console.log(byte.toString(16));
 * }
 * ```
 */

import type { Disposable } from "./channel/channel.js";

/** Push-side callbacks for a stream consumer. */
export interface StreamObserver<T> {
  next(value: T): void;
  error?(error: Error): void;
  complete?(): void;
  /** Drop values the observer has queued but not yet delivered. */
  discard?(): void;
}

/** Handle passed to a producer for emitting values. */
export interface StreamSink<T> {
  next(value: T): void;
  error(error: Error): void;
  complete(): void;
  /** True once the stream has terminated. */
  readonly closed: boolean;
}

/** Starts the producer. May return a teardown run when the stream terminates. */
export type Producer<T> = (sink: StreamSink<T>) => (() => void) | void;

type Terminal = { readonly kind: "complete" } | { readonly kind: "error"; readonly error: Error };

export class HotStream<T> implements AsyncIterable<T> {
  readonly #observers = new Set<StreamObserver<T>>();
  readonly #producer: Producer<T>;
  #started = false;
  #terminal: Terminal | null = null;
  #teardown: (() => void) | null = null;

  constructor(producer: Producer<T>) {
    this.#producer = producer;
  }

  /** A stream that fails every subscriber immediately. */
  static failed<T>(error: Error): HotStream<T> {
    return new HotStream<T>((sink) => sink.error(error));
  }

  /** A stream that completes every subscriber immediately. */
  static completed<T>(): HotStream<T> {
    return new HotStream<T>((sink) => sink.complete());
  }

  /** Whether the producer has been started. */
  get started(): boolean {
    return this.#started;
  }

  /** Whether the stream has completed or failed. */
  get terminated(): boolean {
    return this.#terminal !== null;
  }

  /** Number of attached observers. */
  get observerCount(): number {
    return this.#observers.size;
  }

  /**
   * Attach an observer. Starts the producer on first use. Subscribing to a
   * terminated stream delivers the terminal signal synchronously.
   */
  subscribe(observer: StreamObserver<T>): Disposable {
    if (this.#terminal) {
      deliver(observer, this.#terminal);
      return { dispose: () => {} };
    }

    this.#observers.add(observer);
    if (!this.#started) this.#start();
    return { dispose: () => this.#observers.delete(observer) };
  }

  /** Terminate from the owning side: complete, or fail with `error`. */
  terminate(error?: Error): void {
    this.#finish(error ? { kind: "error", error } : { kind: "complete" });
  }

  /** Ask every observer to drop values it has queued but not delivered. */
  discardBuffered(): void {
    for (const observer of this.#observers) {
      observer.discard?.();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return new StreamIterator(this);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  #start(): void {
    this.#started = true;
    const stream = this;
    const sink: StreamSink<T> = {
      next: (value) => this.#emit(value),
      error: (error) => this.#finish({ kind: "error", error }),
      complete: () => this.#finish({ kind: "complete" }),
      get closed() {
        return stream.#terminal !== null;
      },
    };

    const teardown = this.#producer(sink);
    if (!teardown) return;
    if (this.#terminal) {
      teardown();
    } else {
      this.#teardown = teardown;
    }
  }

  #emit(value: T): void {
    if (this.#terminal) return;
    for (const observer of [...this.#observers]) {
      observer.next(value);
    }
  }

  #finish(terminal: Terminal): void {
    if (this.#terminal) return;
    this.#terminal = terminal;

    const observers = [...this.#observers];
    this.#observers.clear();
    const teardown = this.#teardown;
    this.#teardown = null;
    teardown?.();

    for (const observer of observers) {
      deliver(observer, terminal);
    }
  }
}

function deliver<T>(observer: StreamObserver<T>, terminal: Terminal): void {
  if (terminal.kind === "error") {
    observer.error?.(terminal.error);
  } else {
    observer.complete?.();
  }
}

/**
 * Pull-side adapter: queues pushed values until `next()` asks for them.
 * Subscribes on construction so values emitted before the first `next()`
 * are not lost.
 */
class StreamIterator<T> implements AsyncIterator<T> {
  readonly #queue: Array<{ value: T }> = [];
  #terminal: Terminal | null = null;
  #finished = false;
  readonly #wakers: Array<() => void> = [];
  readonly #subscription: Disposable;

  constructor(stream: HotStream<T>) {
    this.#subscription = stream.subscribe({
      next: (value) => {
        this.#queue.push({ value });
        this.#signal();
      },
      error: (error) => {
        this.#terminal = { kind: "error", error };
        this.#signal();
      },
      complete: () => {
        this.#terminal = { kind: "complete" };
        this.#signal();
      },
      discard: () => {
        this.#queue.length = 0;
      },
    });
  }

  async next(): Promise<IteratorResult<T>> {
    while (true) {
      if (this.#finished) return { done: true, value: undefined };

      const item = this.#queue.shift();
      if (item) return { done: false, value: item.value };

      const terminal = this.#terminal;
      if (terminal) {
        this.#finished = true;
        if (terminal.kind === "error") throw terminal.error;
        return { done: true, value: undefined };
      }

      await new Promise<void>((resolve) => this.#wakers.push(resolve));
    }
  }

  async return(): Promise<IteratorResult<T>> {
    this.#finished = true;
    this.#queue.length = 0;
    this.#subscription.dispose();
    this.#signal();
    return { done: true, value: undefined };
  }

  /** Wake every pending next(); each re-checks the queue in call order. */
  #signal(): void {
    for (const wake of this.#wakers.splice(0)) wake();
  }
}
