/**
 * Link slice: mirrors a ConnectionManager into the UI store.
 *
 * `attach` copies the manager's snapshot on every change and relays
 * incoming records into the records slice. Actions forward to the manager
 * and report failures through `linkError` instead of throwing.
 *
 * @module
 */

import type { StateCreator } from "zustand";
import type { Disposable, PeerId } from "../sdk/channel/channel.js";
import type { ConnectionManager, LinkSnapshot } from "../sdk/manager.js";
import { Status, type ConnectionStatus, type ManagerPhase } from "../sdk/status.js";
import type { RecordsSlice } from "./records.js";

// ── Slice state + actions ────────────────────────────────────────

export interface LinkSlice {
  manager: ConnectionManager<unknown> | null;
  status: ConnectionStatus;
  phase: ManagerPhase;
  boundPeer: PeerId | null;
  radioEnabled: boolean;
  /** Last error reported by the manager or by an action. */
  linkError: string | null;

  /** Mirror `manager` until the returned handle is disposed. */
  attach: (manager: ConnectionManager<unknown>) => Disposable;
  /** Connect out to a peer. */
  connect: (peerId: PeerId) => void;
  /** Drop the active connection. */
  disconnect: () => void;
  /** Re-arm the listen loop. */
  listen: () => void;
  /** Send a record and log it when accepted. */
  send: (record: unknown) => void;
}

// ── Merged store type for cross-slice access ─────────────────────

type StoreSlices = LinkSlice & RecordsSlice;

// ── Slice creator ────────────────────────────────────────────────

export const createLinkSlice: StateCreator<StoreSlices, [], [], LinkSlice> = (set, get) => {
  const mirror = (snapshot: LinkSnapshot) => {
    const patch = {
      status: snapshot.status,
      phase: snapshot.phase,
      boundPeer: snapshot.boundPeer,
      radioEnabled: snapshot.radioEnabled,
    };
    set(snapshot.lastError ? { ...patch, linkError: snapshot.lastError.message } : patch);
  };

  const report = (err: unknown) => {
    set({ linkError: err instanceof Error ? err.message : String(err) });
  };

  return {
    manager: null,
    status: Status.disconnected(),
    phase: "idle",
    boundPeer: null,
    radioEnabled: false,
    linkError: null,

    attach: (manager) => {
      set({ manager, linkError: null });
      mirror(manager.store.getState());

      const unsubscribe = manager.store.subscribe((snapshot) => mirror(snapshot));
      const relay = manager.incomingData.subscribe({
        next: (record) => get().pushRecord("in", record, manager.boundPeer),
      });

      return {
        dispose: () => {
          unsubscribe();
          relay.dispose();
          if (get().manager === manager) set({ manager: null });
        },
      };
    },

    connect: (peerId) => {
      const { manager } = get();
      if (!manager) return;
      set({ linkError: null });
      void manager.connect(peerId).catch(report);
    },

    disconnect: () => {
      get().manager?.disconnect();
    },

    listen: () => {
      const { manager } = get();
      if (!manager) return;
      try {
        manager.listen();
      } catch (err) {
        report(err);
      }
    },

    send: (record) => {
      const { manager } = get();
      if (!manager) return;
      const peerId = manager.boundPeer;
      void manager.send(record).then(
        (sent) => {
          if (sent) {
            get().pushRecord("out", record, peerId);
          } else {
            set({ linkError: "Not connected" });
          }
        },
        report,
      );
    },
  };
};
