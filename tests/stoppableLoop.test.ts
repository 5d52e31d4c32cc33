import { afterEach, describe, expect, it, vi } from "vitest";
import { createStopSignal } from "../src/lib/stopSignal";
import { createStoppableLoop } from "../src/lib/stoppableLoop";

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("stop signal", () => {
  it("times out when nobody sets it", async () => {
    vi.useFakeTimers();
    const signal = createStopSignal();
    const waited = signal.wait(100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(waited).resolves.toBe(false);
    expect(signal.isSet()).toBe(false);
  });

  it("wakes waiters as soon as it is set", async () => {
    vi.useFakeTimers();
    const signal = createStopSignal();
    const waited = signal.wait(60_000);
    signal.set();
    await expect(waited).resolves.toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("returns immediately once set", async () => {
    const signal = createStopSignal();
    signal.set();
    await expect(signal.wait(60_000)).resolves.toBe(true);
  });
});

describe("stoppable loop", () => {
  it("ticks once per interval until joined", async () => {
    vi.useFakeTimers();
    let ticks = 0;
    const loop = createStoppableLoop({ intervalMs: 10, onTick: () => ticks++ });

    loop.start();
    expect(ticks).toBe(1);
    expect(loop.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(25);
    expect(ticks).toBe(3);

    await expect(loop.join()).resolves.toBe(true);
    expect(loop.isRunning()).toBe(false);
    expect(loop.isStopped()).toBe(true);
    expect(ticks).toBe(3);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("stops without waiting out the interval", async () => {
    let ticks = 0;
    const loop = createStoppableLoop({ intervalMs: 60_000, onTick: () => ticks++ });
    loop.start();
    await expect(loop.join(1_000)).resolves.toBe(true);
    expect(ticks).toBe(1);
    expect(loop.isRunning()).toBe(false);
  });

  it("ignores a second start", () => {
    let ticks = 0;
    const loop = createStoppableLoop({ intervalMs: 60_000, onTick: () => ticks++ });
    loop.start();
    loop.start();
    expect(ticks).toBe(1);
    return loop.join();
  });

  it("joins a loop that never started", async () => {
    let ticks = 0;
    const loop = createStoppableLoop({ intervalMs: 10, onTick: () => ticks++ });
    await expect(loop.join()).resolves.toBe(true);
    loop.start();
    expect(ticks).toBe(0);
  });

  it("ends the loop when a tick throws and rethrows on join", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const loop = createStoppableLoop({
      intervalMs: 10,
      onTick: () => {
        throw new Error("tick failed");
      },
    });

    loop.start();
    await expect(loop.join()).rejects.toThrow("tick failed");
    expect(loop.isRunning()).toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
