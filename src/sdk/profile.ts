/**
 * Profile proxies: observe a platform profile service (headset, A2DP, …)
 * through the adapter.
 *
 * Unlike the connection lifecycle, a failure here is surfaced to the caller:
 * the returned stream fails with {@link ProxyUnavailableError}.
 *
 * @example
 * ```ts
 * const events = observeProfile(adapter, HEADSET);
 * const sub = events.subscribe({ next: (e) => console.log(e.state) });
 * // later
 * events.terminate(); // releases the proxy
 * ```
 */

import type { AdapterFacade, ServiceEvent } from "./adapter/adapter.js";
import { HotStream } from "./hot-stream.js";
import { ProxyUnavailableError } from "./errors.js";

/**
 * Open a proxy for `profile` on first subscription. The proxy is released
 * when the stream is terminated.
 */
export function observeProfile<R>(
  adapter: AdapterFacade<R>,
  profile: number,
): HotStream<ServiceEvent> {
  return new HotStream<ServiceEvent>((sink) => {
    const opened =
      adapter.openProfile?.(profile, {
        onServiceConnected: (p) => sink.next({ state: "connected", profile: p }),
        onServiceDisconnected: (p) => sink.next({ state: "disconnected", profile: p }),
      }) ?? false;

    if (!opened) {
      sink.error(new ProxyUnavailableError(profile));
      return;
    }

    return () => adapter.closeProfile?.(profile);
  });
}
