/**
 * Tests for MockClock
 */

import { describe, it, expect } from 'vitest';
import { MockClock } from './clock';
import { TimeoutError } from './errors';

describe('MockClock', () => {
  it('should move time only when advanced', () => {
    const clock = new MockClock(new Date('2025-01-01T00:00:00.000Z'));

    clock.advance(1500);

    expect(clock.iso()).toBe('2025-01-01T00:00:01.500Z');
    expect(clock.timestamp()).toBe(Date.parse('2025-01-01T00:00:01.500Z'));
  });

  it('should resolve delays once their time comes', async () => {
    const clock = new MockClock();
    let done = false;
    const pending = clock.delay(100).then(() => {
      done = true;
    });

    clock.advance(99);
    await Promise.resolve();
    expect(done).toBe(false);

    clock.advance(1);
    await pending;
    expect(done).toBe(true);
    expect(clock.pendingTimers()).toBe(0);
  });

  it('should reject a timeout with a TimeoutError', async () => {
    const clock = new MockClock();
    const timeout = clock.timeout(2000, 'Phase timeout: Build exceeded 2s');

    clock.advance(2000);

    await expect(timeout.promise).rejects.toThrow(TimeoutError);
    await expect(timeout.promise).rejects.toThrow('Phase timeout: Build exceeded 2s');
  });

  it('should disarm a cancelled timeout', () => {
    const clock = new MockClock();
    const timeout = clock.timeout(2000);

    timeout.cancel();

    expect(clock.pendingTimers()).toBe(0);
  });
});
