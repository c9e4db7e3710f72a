import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DebouncedTask } from "./debounced-task";

/** Lets every queued promise callback run; setImmediate is left real. */
const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("DebouncedTask", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs once after the last schedule has been quiet for the delay", () => {
    const action = vi.fn(async () => {});
    const task = new DebouncedTask(action, { onError: vi.fn() });

    task.schedule();
    vi.advanceTimersByTime(100);
    task.schedule();
    vi.advanceTimersByTime(149);
    expect(action).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(action).toHaveBeenCalledTimes(1);
  });

  it("honours a custom delay", () => {
    const action = vi.fn(async () => {});
    const task = new DebouncedTask(action, { delayMs: 10, onError: vi.fn() });

    task.schedule();
    vi.advanceTimersByTime(10);

    expect(action).toHaveBeenCalledTimes(1);
  });

  it("never overlaps runs", async () => {
    const gates: Array<() => void> = [];
    const action = vi.fn(() => new Promise<void>((resolve) => gates.push(resolve)));
    const task = new DebouncedTask(action, { onError: vi.fn() });

    task.schedule();
    vi.advanceTimersByTime(150);
    task.schedule();
    vi.advanceTimersByTime(150);
    await settle();
    expect(action).toHaveBeenCalledTimes(1);

    gates[0]();
    await settle();
    expect(action).toHaveBeenCalledTimes(2);

    gates[1]();
    await task.idle();
    expect(task.pending).toBe(false);
  });

  it("flush skips the wait and resolves when the run is done", async () => {
    const action = vi.fn(async () => {});
    const task = new DebouncedTask(action, { onError: vi.fn() });

    task.schedule();
    await task.flush();

    expect(action).toHaveBeenCalledTimes(1);
    expect(task.pending).toBe(false);
    vi.advanceTimersByTime(1000);
    expect(action).toHaveBeenCalledTimes(1);
  });

  it("idle waits for the scheduled run", async () => {
    const action = vi.fn(async () => {});
    const task = new DebouncedTask(action, { onError: vi.fn() });
    let idle = false;

    task.schedule();
    const waiting = task.idle().then(() => {
      idle = true;
    });
    await settle();
    expect(idle).toBe(false);

    vi.advanceTimersByTime(150);
    await waiting;
    expect(idle).toBe(true);
  });

  it("reports a failing run and keeps working", async () => {
    const failure = new Error("disk full");
    const action = vi.fn().mockRejectedValueOnce(failure).mockResolvedValue(undefined);
    const onError = vi.fn();
    const task = new DebouncedTask(action, { onError });

    task.schedule();
    await task.flush();
    task.schedule();
    await task.flush();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(failure);
    expect(action).toHaveBeenCalledTimes(2);
  });

  it("cancel drops the scheduled run", async () => {
    const action = vi.fn(async () => {});
    const task = new DebouncedTask(action, { onError: vi.fn() });

    task.schedule();
    task.cancel();
    await task.idle();
    vi.advanceTimersByTime(1000);

    expect(action).not.toHaveBeenCalled();
  });
});
