import { describe, it, expect, vi } from "vitest";
import { CR, LF, StreamMultiplexer } from "../../sdk/multiplexer.js";
import { createMemoryChannel } from "../../sdk/channel/memory.js";
import { TransportClosedError, TransportError } from "../../sdk/errors.js";
import { ScriptedChannel, tick } from "../helpers/scripted-channel.js";

async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of stream) values.push(value);
  return values;
}

describe("StreamMultiplexer", () => {
  // ── Reading ──────────────────────────────────────────────────

  it("shares one byte read loop between all subscribers", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    const a: number[] = [];
    const b: number[] = [];

    mux.byteStream().subscribe({ next: (v) => a.push(v) });
    mux.byteStream().subscribe({ next: (v) => b.push(v) });
    expect(channel.byteReads).toBe(1);

    channel.feedBytes([0x41, 0x42]);
    await tick();

    expect(a).toEqual([0x41, 0x42]);
    expect(b).toEqual([0x41, 0x42]);
    expect(channel.byteReads).toBe(3);
    expect(channel.pendingByteReads).toBe(1);
  });

  it("does not read before anyone subscribes", () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    mux.byteStream();
    mux.recordStream();
    expect(channel.byteReads).toBe(0);
    expect(channel.recordReads).toBe(0);
  });

  it("keeps reading after the last subscriber leaves", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    const sub = mux.byteStream().subscribe({ next: vi.fn() });
    sub.dispose();

    channel.feedBytes([1]);
    await tick();

    expect(channel.byteReads).toBe(2);
    const next = vi.fn();
    mux.byteStream().subscribe({ next });
    channel.feedBytes([2]);
    await tick();
    expect(next).toHaveBeenCalledWith(2);
    expect(channel.byteReads).toBe(3);
  });

  it("splits text on every delimiter byte and flushes the tail on close", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    const lines = collect(mux.textStream([CR, LF]));

    channel.feedBytes([0x41, 0x42, 0x0d, 0x0a, 0x43, 0x44]);
    await tick();
    mux.close();
    mux.close();

    expect(await lines).toEqual(["AB", "", "CD"]);
  });

  it("flushes a partial segment before propagating a read failure", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    const iterator = mux.textStream()[Symbol.asyncIterator]();

    channel.feedBytes([0x41]);
    await tick();
    const failure = new TransportClosedError("gone");
    channel.failReads(failure);

    expect(await iterator.next()).toEqual({ done: false, value: "A" });
    await expect(iterator.next()).rejects.toBe(failure);
    expect(mux.state).toBe("failed");
    expect(mux.failure).toBe(failure);
  });

  it("rejects an empty delimiter set", () => {
    const mux = new StreamMultiplexer(new ScriptedChannel());
    expect(() => mux.textStream([])).toThrow(RangeError);
  });

  it("decodes text in the requested encoding", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    const lines = collect(mux.textStream([LF], "utf-8"));

    channel.feedBytes([0xc3, 0xa9, LF]);
    await tick();
    mux.close();

    expect(await lines).toEqual(["é"]);
  });

  it("issues no read after close and drops the one in flight", async () => {
    const channel = new ScriptedChannel({ closeRejectsReads: false });
    const mux = new StreamMultiplexer(channel);
    const seen: number[] = [];
    mux.byteStream().subscribe({ next: (v) => seen.push(v) });
    expect(channel.byteReads).toBe(1);

    mux.close();
    channel.feedBytes([0x01, 0x02]);
    await tick();

    expect(seen).toEqual([]);
    expect(channel.byteReads).toBe(1);
  });

  it("runs a separate loop for records", async () => {
    const channel = new ScriptedChannel<{ n: number }>();
    const mux = new StreamMultiplexer(channel);
    const records: Array<{ n: number }> = [];
    mux.recordStream().subscribe({ next: (r) => records.push(r) });
    mux.recordStream().subscribe({ next: vi.fn() });

    channel.feedRecord({ n: 1 });
    await tick();

    expect(records).toEqual([{ n: 1 }]);
    expect(channel.recordReads).toBe(2);
    expect(channel.byteReads).toBe(0);
  });

  // ── Writing ──────────────────────────────────────────────────

  it("never interleaves concurrent sends", async () => {
    const channel = new ScriptedChannel({ slowWrites: true });
    const mux = new StreamMultiplexer(channel);

    const results = await Promise.all([
      mux.send(Uint8Array.of(1, 2, 3)),
      mux.send(Uint8Array.of(4, 5, 6)),
      mux.sendByte(7),
    ]);

    expect(results).toEqual([true, true, true]);
    expect(channel.written).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("encodes strings as UTF-8 and masks single bytes", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);

    await mux.send("hi");
    await mux.sendByte(0x1ff);

    expect(channel.written).toEqual([0x68, 0x69, 0xff]);
  });

  it("sends records through the channel", async () => {
    const channel = new ScriptedChannel<{ n: number }>();
    const mux = new StreamMultiplexer(channel);

    expect(await mux.sendRecord({ n: 2 })).toBe(true);
    expect(channel.writtenRecords).toEqual([{ n: 2 }]);
  });

  it("returns false from send after close", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    mux.close();

    expect(await mux.send("late")).toBe(false);
    expect(await mux.sendRecord("late")).toBe(false);
    expect(channel.written).toEqual([]);
  });

  it("closes itself when a write fails", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    const onClose = vi.fn();
    mux.onClose(onClose);
    channel.writeError = new TransportError("broken pipe");

    expect(await mux.send("x")).toBe(false);
    expect(mux.state).toBe("failed");
    expect(mux.failure?.code).toBe("TRANSPORT_ERROR");
    expect(channel.closeCount).toBe(1);
    expect(onClose).toHaveBeenCalledWith(channel.writeError);
  });

  it("classifies raw I/O errors from writes", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    channel.writeError = Object.assign(new Error("write EPIPE"), { code: "EPIPE" });

    await mux.send("x");

    expect(mux.failure).toBeInstanceOf(TransportClosedError);
  });

  // ── Lifecycle ────────────────────────────────────────────────

  it("close() is idempotent and contains channel close errors", () => {
    const channel = new ScriptedChannel();
    channel.closeError = new Error("close failed");
    const mux = new StreamMultiplexer(channel);
    const onClose = vi.fn();
    mux.onClose(onClose);

    expect(() => mux.close()).not.toThrow();
    expect(() => mux.close()).not.toThrow();

    expect(channel.closeCount).toBe(1);
    expect(mux.state).toBe("closed");
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith(undefined);
  });

  it("contains a rejected asynchronous channel close", async () => {
    const channel = new ScriptedChannel();
    channel.closeRejection = new Error("async close failed");
    const mux = new StreamMultiplexer(channel);

    mux.close();
    await tick();

    expect(mux.state).toBe("closed");
  });

  it("completes live streams on local close", async () => {
    const channel = new ScriptedChannel();
    const mux = new StreamMultiplexer(channel);
    const bytes = collect(mux.byteStream());
    const records = collect(mux.recordStream());

    mux.close();

    expect(await bytes).toEqual([]);
    expect(await records).toEqual([]);
  });

  it("hands out dead streams once closed or failed", () => {
    const closed = new StreamMultiplexer(new ScriptedChannel());
    closed.close();
    const complete = vi.fn();
    closed.byteStream().subscribe({ next: vi.fn(), complete });
    expect(complete).toHaveBeenCalledTimes(1);

    const channel = new ScriptedChannel();
    const failing = new StreamMultiplexer(channel);
    channel.writeError = new TransportError("boom");
    return failing.send("x").then(() => {
      const error = vi.fn();
      failing.recordStream().subscribe({ next: vi.fn(), error });
      expect(error).toHaveBeenCalledWith(channel.writeError);
    });
  });

  it("fires onClose immediately when already dead", () => {
    const mux = new StreamMultiplexer(new ScriptedChannel());
    mux.close();
    const onClose = vi.fn();
    mux.onClose(onClose);
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  // ── Over a memory channel ───────────────────────────────────

  it("carries records between both ends of a memory channel", async () => {
    const [local, remote] = createMemoryChannel<{ n: number }>({ b: "peer-1" });
    const mux = new StreamMultiplexer(local);
    const iterator = mux.recordStream()[Symbol.asyncIterator]();

    await remote.writeRecord({ n: 1 });
    expect(await iterator.next()).toEqual({ done: false, value: { n: 1 } });

    expect(await mux.sendRecord({ n: 2 })).toBe(true);
    expect(await remote.readRecord()).toEqual({ n: 2 });
    expect(mux.peer).toBe("peer-1");
  });

  it("fails with TransportClosedError when the peer hangs up", async () => {
    const [local, remote] = createMemoryChannel();
    const mux = new StreamMultiplexer(local);
    const error = vi.fn();
    mux.byteStream().subscribe({ next: vi.fn(), error });

    remote.close();
    await tick();

    expect(mux.state).toBe("failed");
    expect(mux.failure).toBeInstanceOf(TransportClosedError);
    expect(error).toHaveBeenCalledWith(mux.failure);
    expect(local.closeCount).toBe(1);
  });
});
