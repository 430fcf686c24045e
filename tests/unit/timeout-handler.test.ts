/**
 * Deadline handling for element resolution
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  Deadline,
  createDeadline,
  isTimeoutError,
  ElementLocationError,
  LocationErrorType,
} from '../../src/services/element-location/index.js';

describe('Deadline', () => {
  it('should track remaining and elapsed time against its clock', () => {
    let now = 1000;
    const deadline = new Deadline(500, () => now);

    now = 1200;
    assert.strictEqual(deadline.remaining(), 300);
    assert.strictEqual(deadline.elapsed(), 200);
    assert.strictEqual(deadline.expired(), false);

    now = 1600;
    assert.strictEqual(deadline.remaining(), 0);
    assert.strictEqual(deadline.expired(), true);
  });

  it('should pass through a result that arrives in time', async () => {
    const value = await createDeadline(1000).run(Promise.resolve(42), 'Quick operation');
    assert.strictEqual(value, 42);
  });

  it('should reject with a timeout error when the deadline passes', async () => {
    const slow = new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200));

    await assert.rejects(createDeadline(10).run(slow, 'Slow operation'), (error: unknown) => {
      assert.ok(isTimeoutError(error));
      assert.strictEqual(error.message, '[ElementLocation] TIMEOUT: Slow operation did not finish within 10ms');
      return true;
    });
  });

  it('should pass through the rejection of the operation', async () => {
    await assert.rejects(createDeadline(1000).run(Promise.reject(new Error('boom')), 'Failing operation'), {
      message: 'boom',
    });
  });
});

describe('isTimeoutError', () => {
  it('should only match timeout location errors', () => {
    assert.strictEqual(isTimeoutError(new ElementLocationError(LocationErrorType.TIMEOUT, 'x')), true);
    assert.strictEqual(isTimeoutError(new ElementLocationError(LocationErrorType.NOT_FOUND, 'x')), false);
    assert.strictEqual(isTimeoutError(new Error('timeout')), false);
  });
});
