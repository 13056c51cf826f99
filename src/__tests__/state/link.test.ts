import { describe, it, expect, afterEach } from "vitest";
import { createLinkmuxStore } from "../../state/store.js";
import { ConnectionManager } from "../../sdk/manager.js";
import { MemoryAdapter } from "../../sdk/adapter/memory.js";
import { createMemoryChannel } from "../../sdk/channel/memory.js";
import { tick } from "../helpers/scripted-channel.js";

describe("link slice", () => {
  let manager: ConnectionManager<unknown> | undefined;

  afterEach(() => {
    manager?.close();
    manager = undefined;
  });

  function setup(missingPermissions: readonly string[] = []) {
    const adapter = new MemoryAdapter({ missingPermissions });
    manager = new ConnectionManager<unknown>({ adapter, serviceName: "svc" });
    const store = createLinkmuxStore();
    const handle = store.getState().attach(manager);
    return { adapter, manager, store, handle };
  }

  it("mirrors the manager snapshot", () => {
    const { manager, store } = setup();
    expect(store.getState().phase).toBe("idle");
    expect(store.getState().radioEnabled).toBe(false);

    manager.start();

    expect(store.getState().status).toEqual({ kind: "waitingForConnection" });
    expect(store.getState().phase).toBe("listening");
    expect(store.getState().radioEnabled).toBe(true);
    expect(store.getState().manager).toBe(manager);
  });

  it("logs incoming records against the bound peer", async () => {
    const { adapter, manager, store } = setup();
    manager.start();
    const [local, remote] = createMemoryChannel({ b: "peer-1" });
    adapter.accept(local);
    await tick();
    expect(store.getState().boundPeer).toBe("peer-1");

    await remote.writeRecord({ temp: 21 });
    await tick();

    expect(store.getState().records).toMatchObject([
      { direction: "in", peerId: "peer-1", record: { temp: 21 } },
    ]);
  });

  it("logs sent records once the multiplexer accepts them", async () => {
    const { adapter, manager, store } = setup();
    manager.start();
    const [local, remote] = createMemoryChannel({ b: "peer-1" });
    adapter.accept(local);
    await tick();

    store.getState().send({ cmd: "ping" });
    await tick();

    expect(await remote.readRecord()).toEqual({ cmd: "ping" });
    expect(store.getState().records).toMatchObject([
      { direction: "out", peerId: "peer-1", record: { cmd: "ping" } },
    ]);
  });

  it("reports a send without a connection", async () => {
    const { store } = setup();
    store.getState().send("hello");
    await tick();

    expect(store.getState().linkError).toBe("Not connected");
    expect(store.getState().records).toEqual([]);
  });

  it("reports missing permissions from connect", async () => {
    const { manager, store } = setup(["BLUETOOTH_CONNECT"]);
    manager.start();

    store.getState().connect("peer-1");
    await tick();

    expect(store.getState().linkError).toBe("Missing permissions: BLUETOOTH_CONNECT");
  });

  it("picks up the manager's last error", async () => {
    const { adapter, manager, store } = setup();
    manager.start();

    store.getState().connect("peer-1");
    adapter.failConnect();
    await tick();

    expect(store.getState().status).toEqual({ kind: "connectionError" });
    expect(store.getState().linkError).toBe("Connect failed");
  });

  it("forwards disconnect and listen", async () => {
    const { adapter, manager, store } = setup();
    manager.start();
    adapter.accept(createMemoryChannel({ b: "peer-1" })[0]);
    await tick();

    store.getState().disconnect();
    expect(store.getState().phase).toBe("idle");
    expect(store.getState().status).toEqual({ kind: "disconnected" });

    store.getState().listen();
    expect(store.getState().phase).toBe("listening");
    expect(adapter.listenCalls).toEqual(["svc", "svc"]);
  });

  it("stops mirroring once disposed", () => {
    const { manager, store, handle } = setup();
    manager.start();
    handle.dispose();

    manager.disconnect();

    expect(store.getState().manager).toBeNull();
    expect(store.getState().phase).toBe("listening");
  });
});
