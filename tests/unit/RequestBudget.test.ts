import { describe, it, expect, beforeEach } from 'vitest';

import {
  RequestBudget,
  getGlobalRequestBudget,
  resetGlobalRequestBudget
} from '../../src/services/RequestBudget.js';

function fakeClock() {
  const state = { now: 0, sleeps: [] as number[] };
  return {
    state,
    now: () => state.now,
    sleep: async (ms: number) => {
      state.sleeps.push(ms);
      state.now += ms;
    }
  };
}

describe('RequestBudget', () => {
  let clock: ReturnType<typeof fakeClock>;

  beforeEach(() => {
    clock = fakeClock();
  });

  it('should not delay the first request', async () => {
    const budget = new RequestBudget({ minSpacingMs: 300, now: clock.now, sleep: clock.sleep });
    await budget.acquire();
    expect(clock.state.sleeps).toEqual([]);
  });

  it('should space consecutive requests by the minimum spacing', async () => {
    const budget = new RequestBudget({ minSpacingMs: 300, now: clock.now, sleep: clock.sleep });

    await Promise.all([budget.acquire(), budget.acquire(), budget.acquire()]);

    expect(clock.state.sleeps).toEqual([300, 300]);
    const metrics = budget.getMetrics();
    expect(metrics.acquiredTotal).toBe(3);
    expect(metrics.queueLength).toBe(0);
    expect(metrics.avgWaitMs).toBe(300);
  });

  it('should wait for a refill once the bucket is empty', async () => {
    const budget = new RequestBudget({
      capacity: 2,
      refillRate: 1,
      minSpacingMs: 0,
      now: clock.now,
      sleep: clock.sleep
    });

    await budget.acquire();
    await budget.acquire();
    await budget.acquire();

    expect(clock.state.sleeps).toEqual([1000]);
    expect(budget.getMetrics().currentTokens).toBe(0);
  });

  it('should serve callers in arrival order', async () => {
    const budget = new RequestBudget({ minSpacingMs: 100, now: clock.now, sleep: clock.sleep });
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3, 4].map((id) => budget.acquire().then(() => order.push(id)))
    );

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it('should keep serving after a failed sleep', async () => {
    let fail = true;
    const budget = new RequestBudget({
      minSpacingMs: 100,
      now: clock.now,
      sleep: async (ms) => {
        if (fail) {
          fail = false;
          throw new Error('sleep interrupted');
        }
        await clock.sleep(ms);
      }
    });

    await budget.acquire();
    await expect(budget.acquire()).rejects.toThrow('sleep interrupted');
    await expect(budget.acquire()).resolves.toBeUndefined();
    expect(budget.getMetrics().acquiredTotal).toBe(2);
  });
});

describe('getGlobalRequestBudget', () => {
  beforeEach(() => {
    resetGlobalRequestBudget();
  });

  it('should return the same instance until reset', () => {
    const first = getGlobalRequestBudget();
    expect(getGlobalRequestBudget()).toBe(first);
    resetGlobalRequestBudget();
    expect(getGlobalRequestBudget()).not.toBe(first);
  });
});
