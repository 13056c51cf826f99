import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PassThrough } from "node:stream";
import { runPeers } from "../commands/peers.js";
import { runDoctor } from "../commands/doctor.js";
import { readVersion, runVersion } from "../commands/version.js";
import { runHeadless } from "../commands/headless.js";
import { MemoryAdapter } from "../sdk/adapter/memory.js";
import { createMemoryChannel } from "../sdk/channel/memory.js";
import { resolveConfig } from "../sdk/config.js";
import { createLink } from "../sdk/link.js";
import { createLogger, silentLogger } from "../sdk/logger.js";

function tick(ms = 20) {
  return new Promise((r) => setTimeout(r, ms));
}

describe("CLI Commands", () => {
  const out: string[] = [];

  beforeEach(() => {
    out.length = 0;
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      out.push(args.map(String).join(" "));
    });
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      out.push(`[stdout] ${String(chunk)}`);
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("peers", () => {
    it("lists named and unnamed peers in aligned columns", () => {
      const adapter = new MemoryAdapter({
        peers: [{ id: "10.0.0.2:7461", name: "phone" }, { id: "10.0.0.3:7000" }],
      });
      runPeers(adapter);

      expect(out).toEqual(["  phone  10.0.0.2:7461", "         10.0.0.3:7000"]);
    });

    it("explains how to add peers when there are none", () => {
      runPeers(new MemoryAdapter());
      expect(out).toEqual(["No bonded peers. Add some with LINKMUX_PEERS=name=host:port,…"]);
    });
  });

  describe("doctor", () => {
    const config = resolveConfig({});

    it("passes when everything is in place", async () => {
      const probe = vi.fn().mockResolvedValue(true);
      await runDoctor(config, new MemoryAdapter(), probe);

      expect(probe).toHaveBeenCalledWith("127.0.0.1", 7461);
      expect(out).toEqual([
        'Configuration ....... ✓ service "linkmux" on 127.0.0.1:7461',
        "[stdout] Permissions ......... ",
        "✓ granted",
        "[stdout] Radio ............... ",
        "✓ enabled",
        "[stdout] Listen address ...... ",
        "✓ 127.0.0.1:7461 available",
        "Bonded peers ........ none",
        "\nAll checks passed.",
      ]);
      expect(process.exitCode).toBeUndefined();
    });

    it("reports each failing check and sets the exit code", async () => {
      const adapter = new MemoryAdapter({
        radioEnabled: false,
        missingPermissions: ["BLUETOOTH_CONNECT"],
        peers: [{ id: "10.0.0.2:7461" }],
      });
      await runDoctor(config, adapter, () => Promise.resolve(false));

      expect(out).toContain("✗ missing BLUETOOTH_CONNECT");
      expect(out).toContain("✗ disabled");
      expect(out).toContain("✗ 127.0.0.1:7461 in use or not bindable");
      expect(out).toContain("Bonded peers ........ 1");
      expect(out.at(-1)).toBe("\nSome checks failed.");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("version", () => {
    it("reads the package version", async () => {
      expect(await readVersion()).toBe("0.1.0");
      await runVersion();
      expect(out).toEqual(["linkmux 0.1.0"]);
    });
  });

  describe("headless", () => {
    it("prints received records and sends typed lines", async () => {
      const adapter = new MemoryAdapter();
      const link = createLink(resolveConfig({}), { adapter, logger: silentLogger });
      const input = new PassThrough();
      const lines: string[] = [];

      const done = runHeadless(link, { input, write: (line) => lines.push(line) });
      await tick();
      expect(adapter.listenCalls).toEqual(["linkmux"]);

      const [local, remote] = createMemoryChannel({ b: "peer-1" });
      adapter.accept(local);
      await tick();

      await remote.writeRecord({ temp: 21 });
      input.write('{"cmd":"ping"}\n');
      await tick();
      expect(await remote.readRecord()).toEqual({ cmd: "ping" });

      input.end();
      await done;

      expect(lines).toEqual(['{"temp":21}']);
      expect(link.manager.phase).toBe("idle");
    });

    it("warns about lines typed while not connected", async () => {
      const logged: string[] = [];
      const logger = createLogger({
        level: "warn",
        write: (line) => logged.push(line),
        now: () => new Date("2024-01-01T00:00:00.000Z"),
      });
      const link = createLink(resolveConfig({}), { adapter: new MemoryAdapter(), logger });
      const input = new PassThrough();

      const done = runHeadless(link, { input, write: () => {} });
      input.write("hi\n");
      await tick();
      input.end();
      await done;

      expect(logged).toEqual([
        '[2024-01-01T00:00:00.000Z] [WARN] [linkmux] Not connected, line dropped | {"line":"hi"}',
      ]);
    });

    it("stops with exit code 1 when permissions are missing", async () => {
      const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
      const adapter = new MemoryAdapter({ missingPermissions: ["BLUETOOTH_CONNECT"] });
      const link = createLink(resolveConfig({}), { adapter, logger: silentLogger });

      await runHeadless(link, { input: new PassThrough(), connectTo: "peer-1", write: () => {} });
      await tick();

      expect(stderr).toHaveBeenCalledWith("Missing permissions: BLUETOOTH_CONNECT\n");
      expect(process.exitCode).toBe(1);
      expect(adapter.connectCalls).toEqual([]);
      expect(() => link.manager.start()).toThrow("Connection manager is closed");
    });
  });
});
