import { describe, it, expect } from "vitest";
import { WriteQueue } from "../../sdk/write-queue.js";

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe("WriteQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new WriteQueue();
    const log: string[] = [];

    const task = (name: string) => async () => {
      log.push(`${name}:start`);
      await tick();
      log.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([queue.run(task("a")), queue.run(task("b"))]);

    expect(results).toEqual(["a", "b"]);
    expect(log).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("keeps going after a failed task", async () => {
    const queue = new WriteQueue();

    const failed = queue.run(async () => {
      throw new Error("write failed");
    });
    const next = queue.run(async () => "ok");

    await expect(failed).rejects.toThrow("write failed");
    expect(await next).toBe("ok");
  });

  it("counts queued and running tasks", async () => {
    const queue = new WriteQueue();
    const first = queue.run(async () => {
      await tick();
    });
    const second = queue.run(async () => {});

    expect(queue.pending).toBe(2);
    await Promise.all([first, second]);
    expect(queue.pending).toBe(0);
  });
});
