import { describe, it, expect, vi, afterEach } from "vitest";
import { ChainClock } from "../apps/operator/src/clock";

describe("chain clock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts at 0 before the first sync", () => {
    const clock = new ChainClock(vi.fn(async () => 50n));
    expect(clock.currentBlock()).toBe(0n);
  });

  it("follows the tip and never moves backwards", async () => {
    const readTip = vi
      .fn<[], Promise<bigint>>()
      .mockResolvedValueOnce(100n)
      .mockResolvedValueOnce(90n)
      .mockResolvedValueOnce(120n);
    const clock = new ChainClock(readTip);

    expect(await clock.sync()).toBe(100n);
    expect(await clock.sync()).toBe(100n);
    expect(await clock.sync()).toBe(120n);
    expect(clock.currentBlock()).toBe(120n);
  });

  it("polls on an interval until stopped", async () => {
    vi.useFakeTimers();
    const readTip = vi.fn(async () => 7n);
    const clock = new ChainClock(readTip);

    clock.start(1_000);
    await vi.advanceTimersByTimeAsync(3_000);
    clock.stop();
    await vi.advanceTimersByTimeAsync(3_000);

    expect(readTip).toHaveBeenCalledTimes(3);
    expect(clock.currentBlock()).toBe(7n);
  });

  it("keeps polling after a failed read", async () => {
    vi.useFakeTimers();
    const readTip = vi
      .fn<[], Promise<bigint>>()
      .mockRejectedValueOnce(new Error("node unreachable"))
      .mockResolvedValue(8n);
    const clock = new ChainClock(readTip);

    clock.start(1_000);
    await vi.advanceTimersByTimeAsync(2_000);
    clock.stop();

    expect(clock.currentBlock()).toBe(8n);
  });
});
