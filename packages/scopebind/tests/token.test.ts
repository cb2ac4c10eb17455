import { describe, expect, it } from 'vitest';

import { describeKey, keyOf } from '../src/core/key.js';
import { isToken, token } from '../src/core/token.js';
import { InvalidTokenError } from '../src/errors/errors.js';

describe('token()', () => {
  it('creates frozen tokens with unique ids and labels', () => {
    const first = token('Example');
    const second = token();

    expect(first.label).toBe('Example');
    expect(second.label).toBe('Token');
    expect(first.id).not.toBe(second.id);
    expect(first.id).toMatch(/^tok_\d+$/);
    expect(Object.isFrozen(first)).toBe(true);
    expect(first.kind).toBe('token');
  });

  it('validates token objects with isToken()', () => {
    const valid = token('Valid');

    expect(isToken(valid)).toBe(true);
    expect(isToken(null)).toBe(false);
    expect(isToken({})).toBe(false);
    expect(isToken({ kind: 'token' })).toBe(false);
    expect(isToken({ kind: 'token', id: 'tok_x', label: 'Fake' })).toBe(true);
  });
});

describe('keyOf()', () => {
  it('uses the token id for untagged keys and appends the tag otherwise', () => {
    const LoggerT = token('Logger');

    expect(keyOf(LoggerT).id).toBe(LoggerT.id);
    expect(keyOf(LoggerT, 'primary').id).toBe(`${LoggerT.id}::primary`);
    expect(keyOf(LoggerT).tag).toBeUndefined();
    expect(Object.isFrozen(keyOf(LoggerT))).toBe(true);
  });

  it('keeps an empty tag apart from no tag', () => {
    const LoggerT = token('Logger');

    expect(keyOf(LoggerT, '').id).toBe(`${LoggerT.id}::`);
    expect(keyOf(LoggerT, '').id).not.toBe(keyOf(LoggerT).id);
  });

  it('builds equal ids for equal token and tag', () => {
    const CacheT = token('Cache');
    expect(keyOf(CacheT, 'a').id).toBe(keyOf(CacheT, 'a').id);
    expect(keyOf(CacheT, 'a').id).not.toBe(keyOf(token('Cache'), 'a').id);
  });

  it('rejects values that are not tokens', () => {
    expect(() => keyOf({} as never)).toThrow(InvalidTokenError);
    expect(() => keyOf('Logger' as never)).toThrow(InvalidTokenError);
  });
});

describe('describeKey()', () => {
  it('labels keys by token label and tag', () => {
    const LoggerT = token('Logger');

    expect(describeKey(keyOf(LoggerT))).toBe('Logger');
    expect(describeKey(keyOf(LoggerT, 'primary'))).toBe('Logger:primary');
    expect(describeKey(keyOf(LoggerT, ''))).toBe('Logger:');
  });
});
