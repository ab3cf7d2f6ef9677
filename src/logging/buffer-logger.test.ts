/**
 * Tests for Buffer Logger and shared structured logging behaviour
 */

import { describe, it, expect } from 'vitest';
import { createBufferLogger } from './buffer-logger';
import { levelForEvent, redactSecrets, LogEventType, LogLevel } from '../types/logger';
import { MockClock } from '../types/clock';

describe('BufferLogger', () => {
  it('should record events with the clock time and merged context', () => {
    const clock = new MockClock(new Date('2025-02-01T08:00:00.000Z'));
    const logger = createBufferLogger({ clock });
    logger.setContext({ workflowId: 'wf_1' });

    logger.event('phase_started', 'Starting phase: Design', { phaseId: 'design' });

    expect(logger.getEvents()).toEqual([
      {
        timestamp: '2025-02-01T08:00:00.000Z',
        level: 'info',
        eventType: 'phase_started',
        message: 'Starting phase: Design',
        metadata: { workflowId: 'wf_1', phaseId: 'design' },
      },
    ]);
  });

  it('should drop events below the minimum level', () => {
    const logger = createBufferLogger({ minLevel: 'warn' });

    logger.info('ignored');
    logger.event('phase_completed', 'ignored too');
    logger.event('phase_failed', 'kept');
    logger.warn('also kept');

    expect(logger.getEvents().map((e) => e.message)).toEqual(['kept', 'also kept']);
    expect(logger.getEventsByLevel('error')).toHaveLength(1);
  });

  it('should redact secrets in messages and string metadata', () => {
    const logger = createBufferLogger();

    logger.info('login with password=test-secret-value', { note: 'token=test-token-value', attempt: 2 });

    const event = logger.getLastEvent();
    expect(event?.message).toBe('login with pass[REDACTED]');
    expect(event?.metadata).toEqual({ note: 'toke[REDACTED]', attempt: 2 });
  });

  it('should give children the parent context and level', () => {
    const logger = createBufferLogger({ minLevel: 'info' });
    logger.setContext({ workflowId: 'wf_1' });

    const child = logger.child({ phaseId: 'impl' });
    child.debug('hidden');
    child.info('visible');

    expect(child.getEvents()).toHaveLength(1);
    expect(child.getEvents()[0].metadata).toEqual({ workflowId: 'wf_1', phaseId: 'impl' });
    expect(logger.getEvents()).toEqual([]);
  });

  it('should clear context and events', () => {
    const logger = createBufferLogger();
    logger.setContext({ taskId: 'task_1' });
    logger.info('first');

    logger.clear();
    logger.clearContext();
    logger.info('second');

    expect(logger.getEvents()).toHaveLength(1);
    expect(logger.getEvents()[0].metadata).toEqual({});
  });

  it('should find events by message', () => {
    const logger = createBufferLogger();
    logger.event('phase_retry', 'Retrying impl (attempt 1) in 100ms');
    logger.event('phase_retry', 'Retrying impl (attempt 2) in 150ms');

    expect(logger.getEventsMatching(/attempt 2/)).toHaveLength(1);
    expect(logger.hasEventType('phase_retry')).toBe(true);
    expect(logger.hasEventType('phase_timeout')).toBe(false);
  });
});

describe('levelForEvent', () => {
  const cases: Array<[LogEventType, LogLevel]> = [
    ['workflow_failed', 'error'],
    ['phase_failed', 'error'],
    ['phase_timeout', 'warn'],
    ['workflow_cancelled', 'warn'],
    ['template_rejected', 'warn'],
    ['context_transition', 'debug'],
    ['workflow_completed', 'info'],
    ['recovery_action', 'info'],
  ];

  it.each(cases)('should log %s at %s', (eventType, level) => {
    expect(levelForEvent(eventType)).toBe(level);
  });
});

describe('redactSecrets', () => {
  it('should leave ordinary text alone', () => {
    expect(redactSecrets('Fix critical login bug in authentication system')).toBe(
      'Fix critical login bug in authentication system'
    );
  });

  it('should use the patterns given', () => {
    expect(redactSecrets('ticket ABC-1234', [/ABC-\d+/g])).toBe('ticket AB[REDACTED]');
  });
});
