/**
 * Tests for Result helpers
 */

import { describe, it, expect } from 'vitest';
import { err, isErr, isOk, ok, unwrap, unwrapOr, type Result } from './result';

function half(n: number): Result<number, string> {
  return n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);
}

describe('Result', () => {
  it('should narrow with isOk and isErr', () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isErr(err('x'))).toBe(true);
  });

  it('should unwrap values and throw errors', () => {
    expect(unwrap(ok('value'))).toBe('value');
    const failure = new Error('nope');
    expect(() => unwrap(err(failure))).toThrow(failure);
  });

  it('should fall back on failure', () => {
    expect(unwrapOr(half(4), 0)).toBe(2);
    expect(unwrapOr(half(3), 0)).toBe(0);
  });
});
