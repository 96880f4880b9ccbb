import { describe, it, expect } from 'vitest';
import { defaultOptions, resolveOptions, DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from './options';
import { CustomError } from './errors';

describe('resolveOptions', () => {
  it('fills in defaults', () => {
    expect(resolveOptions()).toEqual({ maxDepth: DEFAULT_MAX_DEPTH, keyOrder: 'insertion' });
    expect(defaultOptions.maxDepth).toBe(128);
  });

  it('keeps given values', () => {
    expect(resolveOptions({ maxDepth: 3, keyOrder: 'sorted' })).toEqual({
      maxDepth: 3,
      keyOrder: 'sorted',
    });
  });

  it('rejects a non-positive depth', () => {
    expect(() => resolveOptions({ maxDepth: 0 })).toThrow(CustomError);
  });

  it('rejects a fractional depth', () => {
    expect(() => resolveOptions({ maxDepth: 2.5 })).toThrow(/^custom error: invalid options:\n/);
  });

  it('caps the depth', () => {
    expect(resolveOptions({ maxDepth: MAX_DEPTH_LIMIT }).maxDepth).toBe(1000);
    expect(() => resolveOptions({ maxDepth: MAX_DEPTH_LIMIT + 1 })).toThrow(CustomError);
  });

  it('names the offending field', () => {
    expect(() => resolveOptions({ maxDepth: 20_000 })).toThrow(/maxDepth/);
  });
});
