/**
 * Records slice: capped log of records sent and received.
 *
 * @module
 */

import type { StateCreator } from "zustand";
import type { PeerId } from "../sdk/channel/channel.js";
import type { RecordDirection, RecordEntry } from "./types.js";

// ── Constants ────────────────────────────────────────────────────

export const MAX_RECORDS = 200;

// ── Slice state + actions ────────────────────────────────────────

export interface RecordsSlice {
  records: readonly RecordEntry[];
  /** Total records seen, including those dropped from the log. */
  recordCount: number;

  /** Append a record to the log. */
  pushRecord: (direction: RecordDirection, record: unknown, peerId?: PeerId | null) => void;
  /** Clear the log. */
  clearRecords: () => void;
}

// ── Slice creator ────────────────────────────────────────────────

export const createRecordsSlice: StateCreator<RecordsSlice, [], [], RecordsSlice> = (set) => {
  let nextId = 0;

  return {
    records: [],
    recordCount: 0,

    pushRecord: (direction, record, peerId = null) => {
      const entry: RecordEntry = { id: ++nextId, direction, timestamp: Date.now(), peerId, record };
      set((state) => ({
        records:
          state.records.length >= MAX_RECORDS
            ? [...state.records.slice(-(MAX_RECORDS - 1)), entry]
            : [...state.records, entry],
        recordCount: state.recordCount + 1,
      }));
    },

    clearRecords: () => set({ records: [], recordCount: 0 }),
  };
};
