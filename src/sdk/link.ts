/**
 * Link: a ConnectionManager wired to an adapter, built from config.
 *
 * @example
 * ```ts
 * import { createLink, resolveConfig } from "./sdk/index.js";
 *
 * const link = createLink(resolveConfig());
 * link.manager.start();
 *
 * for await (const record of link.manager.incomingData) {
 *   console.log(record);
 * }
 *
 * link.close();
 * ```
 */

import type { AdapterFacade } from "./adapter/adapter.js";
import { TcpAdapter } from "./adapter/tcp.js";
import type { LinkConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { ConnectionManager } from "./manager.js";

/** Records are whatever JSON value the peer sends. */
export interface Link {
  readonly config: LinkConfig;
  readonly adapter: AdapterFacade<unknown>;
  readonly manager: ConnectionManager<unknown>;
  readonly logger: Logger;
  /** Close the manager and every connection it owns. */
  close(): void;
}

export interface CreateLinkOptions {
  logger?: Logger;
  /** Adapter to use instead of the TCP adapter. */
  adapter?: AdapterFacade<unknown>;
}

export function createLink(config: LinkConfig, opts: CreateLinkOptions = {}): Link {
  const logger = opts.logger ?? createLogger({ level: config.logLevel });
  const adapter =
    opts.adapter ??
    new TcpAdapter({ host: config.host, port: config.port, peers: config.peers, logger });
  const manager = new ConnectionManager<unknown>({ adapter, serviceName: config.serviceName, logger });

  return {
    config,
    adapter,
    manager,
    logger,
    close: () => manager.close(),
  };
}
