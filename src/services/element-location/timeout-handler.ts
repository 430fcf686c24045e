/**
 * Timeout Handler - a single deadline shared by every step of one element
 * resolution. There is no retry here: retrying a resolution is the caller's
 * decision.
 */

import { ElementLocationError, LocationErrorType } from './types.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('timeout-handler');

/**
 * Deadline class
 */
export class Deadline {
  private readonly startedAt: number;
  private readonly expiresAt: number;

  constructor(
    readonly timeout: number,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
    this.expiresAt = this.startedAt + timeout;
  }

  /**
   * Milliseconds left, never negative
   */
  remaining(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.now() >= this.expiresAt;
  }

  elapsed(): number {
    return this.now() - this.startedAt;
  }

  /**
   * Wait for an operation, rejecting with a TIMEOUT error once the deadline
   * passes. The timer is cleared as soon as the operation settles.
   */
  run<T>(operation: Promise<T>, description: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        logger.debug({ description, timeout: this.timeout }, 'Deadline passed while waiting');
        reject(
          new ElementLocationError(
            LocationErrorType.TIMEOUT,
            `${description} did not finish within ${this.timeout}ms`
          )
        );
      }, this.remaining());

      operation.then(
        (value) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          if (settled) {
            logger.debug(
              { description, error: error instanceof Error ? error.message : String(error) },
              'Operation failed after its deadline'
            );
            return;
          }
          settled = true;
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }
}

export function createDeadline(timeout: number, now?: () => number): Deadline {
  return new Deadline(timeout, now);
}

export function isTimeoutError(error: unknown): error is ElementLocationError {
  return error instanceof ElementLocationError && error.type === LocationErrorType.TIMEOUT;
}
