import { Logger } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  ClientClosedException,
  RequestCancelledException,
} from './exceptions';

export const REFILL_DELAY_MS = 1000;

/**
 * Token bucket bounding how many requests may be started per second.
 *
 * The bucket starts full, so the first `requestsPerSecond` acquisitions
 * proceed at once. One second later a timer starts adding one token every
 * `1000 / requestsPerSecond` ms, never beyond the initial capacity. Tokens
 * live in a bottleneck reservoir; bottleneck queues the waiters and wakes
 * them as the reservoir grows.
 */
export class TokenBucketRateLimiter {
  private readonly logger = new Logger(TokenBucketRateLimiter.name);
  private readonly limiter: Bottleneck;
  private readonly refillIntervalMs: number;
  private delayTimer: NodeJS.Timeout | null;
  private refillTimer: NodeJS.Timeout | null = null;
  private refillStartedAt = 0;
  private refillsIssued = 0;
  // Every increment goes through this chain so the capacity check and the
  // increment are never interleaved with another increment.
  private topUps: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Rate limit must be a positive integer, got ${capacity}`,
      );
    }

    this.refillIntervalMs = 1000 / capacity;
    this.limiter = new Bottleneck({ reservoir: capacity });

    this.limiter.on('error', (error) => {
      this.logger.error(`Rate limiter error: ${String(error)}`);
    });

    this.delayTimer = setTimeout(() => {
      this.delayTimer = null;
      this.startRefill();
    }, REFILL_DELAY_MS);
    this.delayTimer.unref();

    this.logger.debug(
      `Created rate limiter: ${capacity} RPS, refill every ${this.refillIntervalMs}ms`,
    );
  }

  /**
   * Waits for a token and consumes it. Rejects with
   * {@link RequestCancelledException} if `signal` aborts first; a token handed
   * to a waiter that already gave up goes back into the bucket.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ClientClosedException());
    }
    if (signal?.aborted) {
      return Promise.reject(
        new RequestCancelledException('acquire', signal.reason),
      );
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const onAbort = () => {
        settled = true;
        reject(new RequestCancelledException('acquire', signal?.reason));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.limiter
        .schedule(async () => {
          signal?.removeEventListener('abort', onAbort);
          if (settled) {
            await this.topUp(1);
            return;
          }
          settled = true;
          resolve();
        })
        .catch((error: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          if (settled) {
            // Jobs of cancelled waiters are dropped on close.
            if (!this.closed) {
              this.logger.warn(
                `Failed to return an unused token: ${String(error)}`,
              );
            }
            return;
          }
          settled = true;
          reject(
            this.closed
              ? new ClientClosedException()
              : error instanceof Error
                ? error
                : new Error(String(error)),
          );
        });
    });
  }

  /** Tokens currently in the bucket. */
  async available(): Promise<number> {
    const reservoir = await this.limiter.currentReservoir();
    return reservoir ?? 0;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stops refilling and rejects every queued waiter with
   * {@link ClientClosedException}.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.delayTimer) {
      clearTimeout(this.delayTimer);
      this.delayTimer = null;
    }
    if (this.refillTimer) {
      clearInterval(this.refillTimer);
      this.refillTimer = null;
    }

    await this.limiter.stop({ dropWaitingJobs: true });
    await this.limiter.disconnect();
    this.logger.debug('Rate limiter stopped');
  }

  private startRefill(): void {
    if (this.closed) {
      return;
    }
    this.refillStartedAt = performance.now();
    this.refillTimer = setInterval(() => this.refill(), this.refillIntervalMs);
    this.refillTimer.unref();
  }

  /** Adds the tokens due since refilling started, catching up late ticks. */
  private refill(): void {
    const due = Math.floor(
      (performance.now() - this.refillStartedAt) / this.refillIntervalMs,
    );
    const tokens = due - this.refillsIssued;
    if (tokens <= 0) {
      return;
    }
    this.refillsIssued = due;
    this.topUp(tokens).catch((error: unknown) => {
      if (!this.closed) {
        this.logger.error(`Failed to refill tokens: ${String(error)}`);
      }
    });
  }

  /** Adds up to `tokens` tokens without going past capacity. */
  private topUp(tokens: number): Promise<void> {
    const next = this.topUps.then(async () => {
      if (this.closed) {
        return;
      }
      const reservoir = (await this.limiter.currentReservoir()) ?? 0;
      const room = Math.min(tokens, this.capacity - reservoir);
      if (room > 0) {
        await this.limiter.incrementReservoir(room);
      }
    });
    this.topUps = next.catch(() => undefined);
    return next;
  }
}
