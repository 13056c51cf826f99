import type { ConnectionStatus } from "../sdk/status.js";
import { colors } from "./palette.js";

/** `HH:MM:SS.mmm` in local time. */
export function formatTime(ts: number): string {
  const d = new Date(ts);
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

export function truncate(s: string, max: number): string {
  return s.length > max ? s.slice(0, max) + "…" : s;
}

/** One-line JSON rendering of a record. Strings are shown unquoted. */
export function summarizeRecord(record: unknown, maxLen: number): string {
  if (typeof record === "string") return truncate(record, maxLen);
  let json: string | undefined;
  try {
    json = JSON.stringify(record);
  } catch {
    json = undefined;
  }
  return truncate(json ?? String(record), maxLen);
}

export function statusColor(status: ConnectionStatus): string {
  switch (status.kind) {
    case "connected":
      return colors.success;
    case "waitingForConnection":
      return colors.warning;
    case "connectionError":
      return colors.error;
    case "disconnected":
      return colors.border;
  }
}

/**
 * Turn a line typed by the user into a record: valid JSON is sent as the
 * parsed value, anything else as the raw string.
 */
export function parseRecordInput(text: string): unknown {
  const trimmed = text.trim();
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return trimmed;
  }
}
