/**
 * linkmux SDK: reactive streams over a single duplex link.
 *
 * @example Quick start
 * ```ts
 * import { createLink, resolveConfig, describeStatus } from "./sdk/index.js";
 *
 * const link = createLink(resolveConfig());
 * link.manager.connectionState.subscribe((s) => console.log(describeStatus(s)));
 * link.manager.start();
 *
 * for await (const record of link.manager.incomingData) {
 *   console.log(record);
 * }
 * ```
 *
 * @module
 */

// ── Primary API ─────────────────────────────────────────────────────
export { createLink, type Link, type CreateLinkOptions } from "./link.js";
export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type LinkSnapshot,
  type LinkStore,
  type StateSignal,
} from "./manager.js";
export {
  Status,
  statusEquals,
  describeStatus,
  type ConnectionStatus,
  type ConnectionStatusKind,
  type ManagerPhase,
} from "./status.js";

// ── Streams ─────────────────────────────────────────────────────────
export {
  StreamMultiplexer,
  CR,
  LF,
  DEFAULT_DELIMITERS,
  type MultiplexerState,
  type MultiplexerOptions,
} from "./multiplexer.js";
export { HotStream, type StreamObserver, type StreamSink, type Producer } from "./hot-stream.js";
export { observeProfile } from "./profile.js";

// ── Errors ──────────────────────────────────────────────────────────
export {
  LinkError,
  PermissionDeniedError,
  TransportClosedError,
  TransportError,
  ProxyUnavailableError,
  ManagerClosedError,
  ConfigError,
  classifyError,
  isLinkError,
  isErrorCode,
  type LinkErrorCode,
} from "./errors.js";

// ── Config & logging ────────────────────────────────────────────────
export { resolveConfig, DEFAULT_CONFIG, parsePeers, type LinkConfig } from "./config.js";
export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./logger.js";

// ── Adapters & channels (advanced usage) ────────────────────────────
export {
  observeRadio,
  type AdapterFacade,
  type AttemptOptions,
  type LinkEvent,
  type PeerInfo,
  type ProfileListener,
  type ServiceEvent,
} from "./adapter/adapter.js";
export { TcpAdapter, parsePeerAddress, type TcpAdapterOptions } from "./adapter/tcp.js";
export { MemoryAdapter, type MemoryAdapterOptions } from "./adapter/memory.js";
export { type DuplexChannel, type PeerId, type Disposable } from "./channel/channel.js";
export { SocketChannel } from "./channel/socket.js";
export { createMemoryChannel, MemoryChannel } from "./channel/memory.js";
export { encodeFrame, decodeFrame, FRAME_HEADER_BYTES, MAX_FRAME_BYTES } from "./channel/framing.js";
export { WriteQueue } from "./write-queue.js";
