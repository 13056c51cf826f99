/**
 * Structured error hierarchy for linkmux.
 *
 * All errors extend LinkError with a `.code` discriminant for programmatic
 * handling via switch statements or type predicates.
 *
 * @example
 * ```ts
 * try {
 *   await manager.connect("00:11:22:33:44:55");
 * } catch (e) {
 *   if (e instanceof LinkError) {
 *     switch (e.code) {
 *       case "PERMISSION_DENIED": console.error("Missing:", e.missing); break;
 *       case "MANAGER_CLOSED":    console.log("Already closed"); break;
 *     }
 *   }
 * }
 * ```
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** Union of all error codes for exhaustive switch handling. */
export type LinkErrorCode =
  | "PERMISSION_DENIED"
  | "TRANSPORT_CLOSED"
  | "TRANSPORT_ERROR"
  | "PROXY_UNAVAILABLE"
  | "MANAGER_CLOSED"
  | "INVALID_CONFIG";

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base error for all linkmux errors. */
export class LinkError extends Error {
  readonly code: LinkErrorCode;
  readonly cause?: Error;

  constructor(code: LinkErrorCode, message: string, opts?: { cause?: Error }) {
    super(message);
    this.code = code;
    this.name = "LinkError";
    if (opts?.cause) this.cause = opts.cause;
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** Caller lacks the authorizations needed to open a connection. */
export class PermissionDeniedError extends LinkError {
  readonly code = "PERMISSION_DENIED" as const;
  readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super("PERMISSION_DENIED", `Missing permissions: ${missing.join(", ")}`);
    this.name = "PermissionDeniedError";
    this.missing = missing;
  }
}

/** The peer or the local side closed the channel. */
export class TransportClosedError extends LinkError {
  readonly code = "TRANSPORT_CLOSED" as const;

  constructor(message: string = "Connection is closed", opts?: { cause?: Error }) {
    super("TRANSPORT_CLOSED", message, opts);
    this.name = "TransportClosedError";
  }
}

/** Any other I/O failure on the channel. */
export class TransportError extends LinkError {
  readonly code = "TRANSPORT_ERROR" as const;

  constructor(message: string, opts?: { cause?: Error }) {
    super("TRANSPORT_ERROR", message, opts);
    this.name = "TransportError";
  }
}

/** A profile proxy could not be obtained from the adapter. */
export class ProxyUnavailableError extends LinkError {
  readonly code = "PROXY_UNAVAILABLE" as const;
  readonly profile: number;

  constructor(profile: number) {
    super("PROXY_UNAVAILABLE", `Failed to get profile proxy (profile=${profile})`);
    this.name = "ProxyUnavailableError";
    this.profile = profile;
  }
}

/** Manager was used after close(). */
export class ManagerClosedError extends LinkError {
  readonly code = "MANAGER_CLOSED" as const;

  constructor() {
    super("MANAGER_CLOSED", "Connection manager is closed");
    this.name = "ManagerClosedError";
  }
}

/** A configuration value could not be parsed. */
export class ConfigError extends LinkError {
  readonly code = "INVALID_CONFIG" as const;
  readonly key: string;

  constructor(key: string, message: string) {
    super("INVALID_CONFIG", `${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** Node error codes that mean the other end (or our end) hung up. */
const CLOSED_CODES = new Set([
  "EOF",
  "ECONNRESET",
  "EPIPE",
  "ERR_STREAM_DESTROYED",
  "ERR_STREAM_WRITE_AFTER_END",
  "ERR_STREAM_PREMATURE_CLOSE",
]);

/**
 * Map any thrown value from a channel operation onto the transport error
 * kinds. LinkErrors pass through untouched.
 */
export function classifyError(err: unknown): LinkError {
  if (err instanceof LinkError) return err;
  const cause = err instanceof Error ? err : new Error(String(err));
  const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
  if (code !== undefined && CLOSED_CODES.has(code)) {
    return new TransportClosedError("Can't read stream", { cause });
  }
  return new TransportError(cause.message, { cause });
}

// ---------------------------------------------------------------------------
// Type predicates
// ---------------------------------------------------------------------------

/** Narrow any caught value to a {@link LinkError}. */
export function isLinkError(err: unknown): err is LinkError {
  return err instanceof LinkError;
}

/** Narrow to a specific error by code. */
export function isErrorCode<C extends LinkErrorCode>(
  err: unknown,
  code: C,
): err is LinkError & { code: C } {
  return err instanceof LinkError && err.code === code;
}
