/**
 * RequestBudget: process-wide rate limiter for Morpho API requests
 *
 * Token bucket with a minimum spacing between request starts. Callers are
 * served strictly in arrival order, so the limit holds across every stage and
 * any number of concurrent callers sharing one instance.
 */

import { budgetWaitSeconds } from '../metrics/index.js';

export interface RequestBudgetMetrics {
  currentTokens: number;
  queueLength: number;
  acquiredTotal: number;
  avgWaitMs: number;
}

export interface RequestBudgetOptions {
  capacity?: number;
  /** Tokens per second. */
  refillRate?: number;
  minSpacingMs?: number;
  jitterMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class RequestBudget {
  private tokens: number;
  private readonly capacity: number;
  private readonly refillRate: number;
  private readonly minSpacingMs: number;
  private readonly jitterMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRefillTime: number;
  private lastAcquireTime: number | null = null;
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private acquiredCount = 0;
  private totalWaitMs = 0;

  constructor(options: RequestBudgetOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 20);
    this.refillRate = Math.max(0.001, options.refillRate ?? 16);
    this.minSpacingMs = Math.max(0, options.minSpacingMs ?? 300);
    this.jitterMs = Math.max(0, options.jitterMs ?? 0);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;

    this.tokens = this.capacity;
    this.lastRefillTime = this.now();
  }

  /**
   * Wait for a request slot. Resolves once a token is taken and the minimum
   * spacing since the previous slot has elapsed.
   */
  acquire(): Promise<void> {
    const enqueuedAt = this.now();
    this.waiting++;
    const turn = this.tail.then(() => this.takeSlot(enqueuedAt));
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async takeSlot(enqueuedAt: number): Promise<void> {
    try {
      this.refill();
      if (this.tokens < 1) {
        const msToWait = ((1 - this.tokens) / this.refillRate) * 1000;
        await this.sleep(Math.ceil(msToWait));
        this.refill();
      }

      if (this.lastAcquireTime !== null) {
        const sinceLast = this.now() - this.lastAcquireTime;
        if (sinceLast < this.minSpacingMs) {
          await this.sleep(this.minSpacingMs - sinceLast + this.getJitter());
        }
      }

      this.tokens = Math.max(0, this.tokens - 1);
      this.lastAcquireTime = this.now();
      this.acquiredCount++;

      const waitMs = this.lastAcquireTime - enqueuedAt;
      this.totalWaitMs += waitMs;
      budgetWaitSeconds.observe(waitMs / 1000);
    } finally {
      this.waiting--;
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedSec = (now - this.lastRefillTime) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSec * this.refillRate);
    this.lastRefillTime = now;
  }

  private getJitter(): number {
    return this.jitterMs > 0 ? Math.random() * this.jitterMs : 0;
  }

  getMetrics(): RequestBudgetMetrics {
    this.refill();
    return {
      currentTokens: this.tokens,
      queueLength: this.waiting,
      acquiredTotal: this.acquiredCount,
      avgWaitMs: this.acquiredCount > 0 ? this.totalWaitMs / this.acquiredCount : 0
    };
  }
}

let globalBudget: RequestBudget | null = null;

/**
 * Shared budget used when a client is not handed its own.
 */
export function getGlobalRequestBudget(options?: RequestBudgetOptions): RequestBudget {
  if (!globalBudget) {
    globalBudget = new RequestBudget(options);
  }
  return globalBudget;
}

export function resetGlobalRequestBudget(): void {
  globalBudget = null;
}
