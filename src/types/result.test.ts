/**
 * Tests for Result helpers
 */

import { describe, it, expect } from 'vitest';
import { ok, err, isOk, isErr, unwrapOr, map, partition, Result } from './result';

describe('Result', () => {
  it('should narrow Ok and Err', () => {
    const good: Result<number, string> = ok(2);
    const bad: Result<number, string> = err('nope');

    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
    expect(unwrapOr(good, 0)).toBe(2);
    expect(unwrapOr(bad, 0)).toBe(0);
  });

  it('should map only Ok values', () => {
    const double = (n: number): number => n * 2;

    expect(map(ok(21), double)).toEqual({ ok: true, value: 42 });
    expect(map(err<string>('nope'), double)).toEqual({ ok: false, error: 'nope' });
  });

  it('should partition results in order', () => {
    const results: Result<string, string>[] = [ok('a.yaml'), err('b.yaml: bad'), ok('c.json')];

    expect(partition(results)).toEqual({ values: ['a.yaml', 'c.json'], errors: ['b.yaml: bad'] });
  });
});
