/**
 * useLink: binds a ConnectionManager to the app store for the lifetime of a
 * component.
 *
 * Attaches the manager on mount (starting it if needed) and detaches on
 * unmount. The manager itself is owned by the caller; unmounting does not
 * close it.
 *
 * @example
 * ```tsx
 * function Monitor({ manager }: { manager: ConnectionManager }) {
 *   const [state, actions] = useLink(manager);
 *   useInput((input) => input === "d" && actions.disconnect());
 *   return <Text>{describeStatus(state.status)}</Text>;
 * }
 * ```
 *
 * @module
 */

import { useEffect } from "react";
import { useShallow } from "zustand/react/shallow";
import type { ConnectionManager } from "../sdk/manager.js";
import { useLinkStore, type LinkmuxStore } from "../state/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LinkState = Pick<
  LinkmuxStore,
  "status" | "phase" | "boundPeer" | "radioEnabled" | "linkError" | "records" | "recordCount"
>;

export type LinkActions = Pick<
  LinkmuxStore,
  "connect" | "disconnect" | "listen" | "send" | "clearRecords"
>;

export interface UseLinkOptions {
  /** Peer to connect to once attached. Without it the manager listens. */
  connectTo?: string;
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

export function useLink(
  manager: ConnectionManager<unknown>,
  opts: UseLinkOptions = {},
): [LinkState, LinkActions] {
  const { connectTo } = opts;

  useEffect(() => {
    const store = useLinkStore.getState();
    const handle = store.attach(manager);
    manager.start();
    if (connectTo) store.connect(connectTo);
    return () => handle.dispose();
  }, [manager, connectTo]);

  const state = useLinkStore(
    useShallow((s) => ({
      status: s.status,
      phase: s.phase,
      boundPeer: s.boundPeer,
      radioEnabled: s.radioEnabled,
      linkError: s.linkError,
      records: s.records,
      recordCount: s.recordCount,
    })),
  );

  const actions = useLinkStore(
    useShallow((s) => ({
      connect: s.connect,
      disconnect: s.disconnect,
      listen: s.listen,
      send: s.send,
      clearRecords: s.clearRecords,
    })),
  );

  return [state, actions];
}
