/**
 * Record framing for byte transports: a 4-byte big-endian length followed by
 * the record as UTF-8 JSON.
 */

import { TransportError } from "../errors.js";

export const FRAME_HEADER_BYTES = 4;
export const MAX_FRAME_BYTES = 16 * 1024 * 1024;

/** Encode one record as a frame. */
export function encodeFrame(record: unknown): Buffer {
  const json = JSON.stringify(record);
  if (json === undefined) {
    throw new TypeError("Record is not JSON-serializable");
  }
  const body = Buffer.from(json, "utf8");
  if (body.length > MAX_FRAME_BYTES) {
    throw new RangeError(`Record too large (${body.length} bytes)`);
  }
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Decode the frame at the start of `buffer`. Returns null until the whole
 * frame has arrived; `size` is the number of bytes it occupied.
 */
export function decodeFrame(buffer: Buffer): { value: unknown; size: number } | null {
  if (buffer.length < FRAME_HEADER_BYTES) return null;

  const length = buffer.readUInt32BE(0);
  if (length > MAX_FRAME_BYTES) {
    throw new TransportError(`Frame too large (${length} bytes)`);
  }
  const size = FRAME_HEADER_BYTES + length;
  if (buffer.length < size) return null;

  const json = buffer.subarray(FRAME_HEADER_BYTES, size).toString("utf8");
  try {
    const value: unknown = JSON.parse(json);
    return { value, size };
  } catch (err) {
    throw new TransportError("Malformed record frame", {
      cause: err instanceof Error ? err : undefined,
    });
  }
}
