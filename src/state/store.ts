/**
 * linkmux store: UI state via Zustand with sliced concerns.
 *
 * | Slice   | Concern                                  |
 * |---------|------------------------------------------|
 * | link    | Mirrored manager status, link actions    |
 * | records | Capped log of records in both directions |
 *
 * @example
 * ```tsx
 * function Header() {
 *   const status = useLinkStore((s) => s.status);
 *   return <Text>{describeStatus(status)}</Text>;
 * }
 *
 * // Outside React
 * const detach = useLinkStore.getState().attach(manager);
 * ```
 *
 * @module
 */

import { create } from "zustand";
import { createStore } from "zustand/vanilla";
import { createLinkSlice, type LinkSlice } from "./link.js";
import { createRecordsSlice, type RecordsSlice } from "./records.js";

// ── Combined store type ──────────────────────────────────────────

export interface LinkmuxStore extends LinkSlice, RecordsSlice {}

// ── Store creation ───────────────────────────────────────────────

/** The app-wide store, as a React hook. */
export const useLinkStore = create<LinkmuxStore>()((...a) => ({
  ...createLinkSlice(...a),
  ...createRecordsSlice(...a),
}));

/** A standalone store, for headless use and tests. */
export function createLinkmuxStore() {
  return createStore<LinkmuxStore>()((...a) => ({
    ...createLinkSlice(...a),
    ...createRecordsSlice(...a),
  }));
}
