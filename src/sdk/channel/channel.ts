/** Identity of a remote peer (a device address, or `host:port` over TCP). */
export type PeerId = string;

/** Callback cleanup handle. */
export interface Disposable {
  dispose(): void;
}

/**
 * An established bidirectional channel to one peer: the accepted or
 * connected socket.
 *
 * Reads are pull-based and block (await) until data is available. A read
 * on a channel whose peer hung up rejects with `TransportClosedError`;
 * `close()` rejects pending reads the same way where the implementation
 * can. Record encoding is owned by the channel.
 */
export interface DuplexChannel<R = unknown> {
  /** The peer on the other end. */
  readonly remotePeer: PeerId;

  /** Read a single byte (0–255). */
  readByte(): Promise<number>;

  /** Read a single framed record. */
  readRecord(): Promise<R>;

  /** Write raw bytes. Resolves once the bytes are handed to the transport. */
  write(data: Uint8Array): Promise<void>;

  /** Write a single framed record. */
  writeRecord(record: R): Promise<void>;

  /** Release the channel. May throw; callers are expected to contain it. */
  close(): void | Promise<void>;
}
