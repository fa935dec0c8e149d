import { describe, expect, it, vi } from 'vitest';
import { NoopPacer, RequestPacer } from '../pacer.js';
import { sequence } from './fakes.js';

const createClockedPacer = (random: () => number) => {
  let now = 100_000;
  const wait = vi.fn(async (ms: number) => {
    now += ms;
  });
  const pacer = new RequestPacer({
    minDelayMs: 1500,
    maxDelayMs: 3000,
    now: () => now,
    random,
    wait,
  });
  return { pacer, wait, clock: () => now };
};

describe('RequestPacer', () => {
  it('draws delays inside the configured bounds', () => {
    expect(new RequestPacer({ minDelayMs: 1500, maxDelayMs: 3000, random: () => 0 }).state.currentDelay).toBe(1500);
    expect(new RequestPacer({ minDelayMs: 1500, maxDelayMs: 3000, random: () => 1 }).state.currentDelay).toBe(3000);
  });

  it('spaces sequential acquisitions by the delay drawn at the previous one', async () => {
    const { pacer, wait, clock } = createClockedPacer(sequence(0, 1, 0.5, 0.5));
    const stamps: number[] = [];

    for (let i = 0; i < 3; i += 1) {
      await pacer.acquireSlot();
      stamps.push(clock());
    }

    expect(stamps).toEqual([100_000, 103_000, 105_250]);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([3000, 2250]);
  });

  it('does not wait when the previous request is old enough', async () => {
    const { pacer, wait } = createClockedPacer(() => 0);
    await pacer.acquireSlot();
    expect(wait).not.toHaveBeenCalled();
    expect(pacer.state.lastRequestTimestamp).toBe(100_000);
  });

  it('queues concurrent callers one delay apart', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const pacer = new RequestPacer({
      minDelayMs: 1500,
      maxDelayMs: 3000,
      now: () => 100_000,
      random: sequence(0, 1, 0.5, 0.5),
      wait,
    });

    await Promise.all([pacer.acquireSlot(), pacer.acquireSlot(), pacer.acquireSlot()]);

    expect(wait.mock.calls.map(([ms]) => ms).sort((a, b) => a - b)).toEqual([3000, 5250]);
    expect(pacer.state.lastRequestTimestamp).toBe(105_250);
  });

  it('rejects an already aborted caller without touching the state', async () => {
    const { pacer } = createClockedPacer(() => 0);
    const controller = new AbortController();
    controller.abort();

    await expect(pacer.acquireSlot(controller.signal)).rejects.toThrow();
    expect(pacer.state.lastRequestTimestamp).toBe(0);
  });

  it('cancels a pending wait when the caller aborts', async () => {
    const pacer = new RequestPacer({ minDelayMs: 60_000, maxDelayMs: 60_000 });
    await pacer.acquireSlot();

    const controller = new AbortController();
    const pending = pacer.acquireSlot(controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow();
  });
});

describe('NoopPacer', () => {
  it('never waits', async () => {
    await expect(new NoopPacer().acquireSlot()).resolves.toBeUndefined();
  });
});
