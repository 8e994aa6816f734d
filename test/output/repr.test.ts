/**
 * Unit tests for value and error text
 */

import { describe, it, expect } from 'vitest';
import { describeException, safeRepr, stackTail, truncate, UNPRINTABLE } from '../../src/output/repr.js';

describe('safeRepr', () => {
  it('formats values with util.inspect', () => {
    expect(safeRepr([1, 2, 3])).toBe('[ 1, 2, 3 ]');
    expect(safeRepr('text')).toBe("'text'");
  });

  it('degrades to a placeholder when formatting throws', () => {
    expect(
      safeRepr(1, () => {
        throw new Error('boom');
      })
    ).toBe(UNPRINTABLE);
  });
});

describe('describeException', () => {
  it('formats name and message', () => {
    expect(describeException(new TypeError('bad input'))).toBe('TypeError: bad input');
  });

  it('shows the name alone for an empty message', () => {
    expect(describeException(new RangeError())).toBe('RangeError');
  });

  it('describes thrown non-errors', () => {
    expect(describeException('plain')).toBe('Error: plain');
  });

  it('degrades when the message cannot be read', () => {
    const error = new Error('hidden');
    Object.defineProperty(error, 'message', {
      get() {
        throw new Error('no message');
      },
    });
    expect(describeException(error)).toBe('Error: (unprintable exception: Error: no message)');
  });
});

describe('stackTail', () => {
  it('returns nothing without a limit', () => {
    expect(stackTail(new Error('x'), 0)).toEqual([]);
  });

  it('keeps application frames up to the limit', () => {
    const error = new Error('x');
    error.stack = [
      'Error: x',
      '    at total (/app/orders.ts:4:5)',
      '    at Module._compile (node:internal/modules/cjs/loader:1356:14)',
      '    at checkout (/app/orders.ts:10:3)',
      '    at main (/app/orders.ts:14:1)',
    ].join('\n');
    expect(stackTail(error, 2)).toEqual(['at total (/app/orders.ts:4:5)', 'at checkout (/app/orders.ts:10:3)']);
  });
});

describe('truncate', () => {
  it('cuts with an ellipsis character', () => {
    expect(truncate('abcdefgh', 5)).toBe('abcd…');
    expect(truncate('abc', 5)).toBe('abc');
  });
});
