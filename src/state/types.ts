/**
 * Shared types used across store slices.
 *
 * @module
 */

import type { PeerId } from "../sdk/channel/channel.js";

/** Which way a record travelled. */
export type RecordDirection = "in" | "out";

/** One line in the record log. */
export interface RecordEntry {
  readonly id: number;
  readonly direction: RecordDirection;
  readonly timestamp: number;
  readonly peerId: PeerId | null;
  readonly record: unknown;
}
