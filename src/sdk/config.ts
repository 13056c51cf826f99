/**
 * Runtime configuration.
 *
 * Values come from the environment (`LINKMUX_*`) and are overridden by
 * explicit settings, normally CLI flags.
 *
 * | Variable            | Default     |
 * | ------------------- | ----------- |
 * | `LINKMUX_SERVICE`   | `linkmux`   |
 * | `LINKMUX_HOST`      | `127.0.0.1` |
 * | `LINKMUX_PORT`      | `7461`      |
 * | `LINKMUX_PEERS`     | (none)      |
 * | `LINKMUX_LOG_LEVEL` | `info`      |
 *
 * `LINKMUX_PEERS` is a comma-separated list of `name=host:port` entries.
 */

import type { PeerInfo } from "./adapter/adapter.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "./logger.js";

export interface LinkConfig {
  /** Service name advertised while listening. */
  serviceName: string;
  /** Listen address. */
  host: string;
  port: number;
  /** Known peers. */
  peers: PeerInfo[];
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<LinkConfig> = {
  serviceName: "linkmux",
  host: "127.0.0.1",
  port: 7461,
  peers: [],
  logLevel: "info",
};

type Env = Readonly<Record<string, string | undefined>>;

/** Merge defaults, environment and `overrides`, in that order. */
export function resolveConfig(
  env: Env = process.env,
  overrides: Partial<LinkConfig> = {},
): LinkConfig {
  const config: LinkConfig = { ...DEFAULT_CONFIG, peers: [] };

  const service = env["LINKMUX_SERVICE"]?.trim();
  if (service) config.serviceName = service;

  const host = env["LINKMUX_HOST"]?.trim();
  if (host) config.host = host;

  const port = env["LINKMUX_PORT"]?.trim();
  if (port) config.port = parsePort(port, "LINKMUX_PORT");

  const peers = env["LINKMUX_PEERS"];
  if (peers) config.peers = parsePeers(peers);

  const level = env["LINKMUX_LOG_LEVEL"]?.trim();
  if (level) config.logLevel = parseLogLevel(level, "LINKMUX_LOG_LEVEL");

  if (overrides.serviceName !== undefined) config.serviceName = overrides.serviceName;
  if (overrides.host !== undefined) config.host = overrides.host;
  if (overrides.port !== undefined) config.port = parsePort(String(overrides.port), "port");
  if (overrides.peers !== undefined) config.peers = overrides.peers;
  if (overrides.logLevel !== undefined) config.logLevel = overrides.logLevel;
  return config;
}

export function parsePort(value: string, key: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new ConfigError(key, `expected a port between 1 and 65535, got "${value}"`);
  }
  return port;
}

export function parseLogLevel(value: string, key: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(key, `expected one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return level;
}

/** Parse `name=host:port,…`. A bare `host:port` entry has no name. */
export function parsePeers(value: string): PeerInfo[] {
  const peers: PeerInfo[] = [];
  for (const raw of value.split(",")) {
    const entry = raw.trim();
    if (!entry) continue;

    const eq = entry.indexOf("=");
    const name = eq >= 0 ? entry.slice(0, eq).trim() : "";
    const id = (eq >= 0 ? entry.slice(eq + 1) : entry).trim();
    if (!id.includes(":")) {
      throw new ConfigError("LINKMUX_PEERS", `expected name=host:port, got "${entry}"`);
    }
    peers.push(name ? { id, name } : { id });
  }
  return peers;
}
