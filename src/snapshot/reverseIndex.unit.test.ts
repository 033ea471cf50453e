import { describe, expect, it } from 'vitest';
import { ReverseIndex } from './reverseIndex.js';
import { ErrorCode } from '../types/enums.js';
import { errorCodeOf } from '../testing/errorTestHelpers.js';

describe('ReverseIndex', () => {
  it('starts absent and builds once on demand', () => {
    const index = new ReverseIndex<string>();
    expect(index.status).toBe('absent');
    expect(index.peek()).toBeUndefined();

    const entries: Array<readonly [number, string]> = [
      [1, 'A'],
      [2, 'B']
    ];
    const map = index.ensure(() => entries);
    expect(index.status).toBe('present');
    expect(map.get(2)).toBe('B');
    expect(index.ensure(() => [])).toBe(map);
    expect(index.buildCount).toBe(1);
  });

  it('patches only a present map', () => {
    const index = new ReverseIndex<string>();
    index.set(1, 'A');
    expect(index.peek()).toBeUndefined();

    index.ensure(() => []);
    index.set(1, 'A');
    expect(index.peek()?.get(1)).toBe('A');
    index.delete(1);
    expect(index.peek()?.has(1)).toBe(false);
  });

  it('drops the map on invalidate and rebuilds it later', () => {
    const index = new ReverseIndex<string>();
    index.ensure(() => []);
    index.invalidate();
    expect(index.status).toBe('absent');
    index.ensure(() => []);
    expect(index.buildCount).toBe(2);
  });

  it('rejects a request made while building', () => {
    const index = new ReverseIndex<string>();
    let nested: ErrorCode | undefined;
    index.ensure(() => {
      nested = errorCodeOf(() => index.ensure(() => []));
      return [];
    });
    expect(nested).toBe(ErrorCode.INVALID_STATE);
    expect(index.status).toBe('present');
  });

  it('returns to absent when building fails', () => {
    const index = new ReverseIndex<string>();
    expect(() =>
      index.ensure(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(index.status).toBe('absent');
    expect(index.buildCount).toBe(0);
  });
});
