import { describe, it, expect } from "vitest";
import { KeyedQueue } from "./keyed-queue";

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("KeyedQueue", () => {
  it("runs one key in submission order and other keys alongside", async () => {
    const queue = new KeyedQueue();
    const log: string[] = [];

    const results = await Promise.all([
      queue.run("a", async () => {
        log.push("a1 start");
        await settle();
        log.push("a1 end");
        return 1;
      }),
      queue.run("a", async () => {
        log.push("a2");
        return 2;
      }),
      queue.run("b", async () => {
        log.push("b");
        return 3;
      }),
    ]);

    expect(results).toEqual([1, 2, 3]);
    expect(log).toEqual(["a1 start", "b", "a1 end", "a2"]);
  });

  it("keeps going after a failed task", async () => {
    const queue = new KeyedQueue();

    const failed = queue.run("k", async () => {
      throw new Error("nope");
    });
    const next = queue.run("k", async () => "ok");

    await expect(failed).rejects.toThrow("nope");
    await expect(next).resolves.toBe("ok");
  });

  it("forgets keys once their work has settled", async () => {
    const queue = new KeyedQueue();

    void queue.run("a", async () => settle());
    void queue.run("b", async () => settle());
    expect(queue.size).toBe(2);

    await queue.drain();
    expect(queue.size).toBe(0);
  });
});
