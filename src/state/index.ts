/**
 * linkmux state management: public API.
 *
 * @module
 */

// Store
export { useLinkStore, createLinkmuxStore } from "./store.js";
export type { LinkmuxStore } from "./store.js";

// Types
export type { RecordEntry, RecordDirection } from "./types.js";

// Slice types (for advanced composition / testing)
export type { LinkSlice } from "./link.js";
export type { RecordsSlice } from "./records.js";

// Constants
export { MAX_RECORDS } from "./records.js";
