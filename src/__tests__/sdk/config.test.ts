import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, parsePeers, resolveConfig } from "../../sdk/config.js";
import { ConfigError } from "../../sdk/errors.js";

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads LINKMUX_* variables", () => {
    const config = resolveConfig({
      LINKMUX_SERVICE: " sensors ",
      LINKMUX_HOST: "0.0.0.0",
      LINKMUX_PORT: "9000",
      LINKMUX_PEERS: "phone=10.0.0.2:7461",
      LINKMUX_LOG_LEVEL: "DEBUG",
    });

    expect(config).toEqual({
      serviceName: "sensors",
      host: "0.0.0.0",
      port: 9000,
      peers: [{ id: "10.0.0.2:7461", name: "phone" }],
      logLevel: "debug",
    });
  });

  it("lets overrides win over the environment", () => {
    const config = resolveConfig(
      { LINKMUX_PORT: "9000", LINKMUX_SERVICE: "env" },
      { port: 9100, serviceName: "flag" },
    );
    expect(config.port).toBe(9100);
    expect(config.serviceName).toBe("flag");
  });

  it("rejects a bad port", () => {
    expect(() => resolveConfig({ LINKMUX_PORT: "70000" })).toThrow(ConfigError);
    expect(() => resolveConfig({ LINKMUX_PORT: "12ab" })).toThrow(
      'LINKMUX_PORT: expected a port between 1 and 65535, got "12ab"',
    );
    expect(() => resolveConfig({}, { port: 0 })).toThrow('port: expected a port');
  });

  it("rejects an unknown log level", () => {
    expect(() => resolveConfig({ LINKMUX_LOG_LEVEL: "loud" })).toThrow(
      'LINKMUX_LOG_LEVEL: expected one of debug, info, warn, error, silent, got "loud"',
    );
  });

  it("does not share the default peer list", () => {
    const config = resolveConfig({});
    config.peers.push({ id: "a:1" });
    expect(DEFAULT_CONFIG.peers).toEqual([]);
  });
});

describe("parsePeers", () => {
  it("parses named and bare entries", () => {
    expect(parsePeers("phone=10.0.0.2:7461, 10.0.0.3:7000,")).toEqual([
      { id: "10.0.0.2:7461", name: "phone" },
      { id: "10.0.0.3:7000" },
    ]);
  });

  it("rejects an entry without a port", () => {
    expect(() => parsePeers("phone=10.0.0.2")).toThrow(
      'LINKMUX_PEERS: expected name=host:port, got "phone=10.0.0.2"',
    );
  });
});
