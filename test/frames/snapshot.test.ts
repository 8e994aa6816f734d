/**
 * Tests for frame snapshots
 */

import { describe, it, expect } from 'vitest';
import { parseSnapshot, SnapshotError } from '../../src/frames/snapshot.js';

const SNAPSHOT = {
  event: 'exception',
  frames: [
    { file: '/app/main.ts', line: 20 },
    { file: '/app/orders.ts', line: 4, function: 'total', locals: { sum: 3 }, exceptionLine: 6 },
  ],
  exception: { name: 'TypeError', message: 'bad item' },
  sources: { '/app/main.ts': 'main();' },
};

describe('parseSnapshot', () => {
  it('links frames innermost first', () => {
    const { stop, sources } = parseSnapshot(JSON.stringify(SNAPSHOT));

    expect(stop.kind).toBe('exception');
    expect(stop.frame).toMatchObject({ file: '/app/orders.ts', line: 4, functionName: 'total', exceptionLine: 6 });
    expect(stop.frame.locals).toEqual({ sum: 3 });
    expect(stop.frame.caller).toMatchObject({ file: '/app/main.ts', functionName: '<module>', caller: null });
    expect(sources).toEqual({ '/app/main.ts': 'main();' });
  });

  it('rebuilds the exception as an Error', () => {
    const error = parseSnapshot(JSON.stringify(SNAPSHOT)).stop.exception;
    expect(error).toBeInstanceOf(Error);
    if (error instanceof Error) {
      expect(error.name).toBe('TypeError');
      expect(error.message).toBe('bad item');
    }
  });

  it('defaults to a line event without sources', () => {
    const { stop, sources } = parseSnapshot(JSON.stringify({ frames: [{ file: '/app/main.ts', line: 1 }] }));
    expect(stop.kind).toBe('line');
    expect(stop.exception).toBeUndefined();
    expect(sources).toEqual({});
  });

  it('rejects invalid JSON', () => {
    expect(() => parseSnapshot('{')).toThrow(SnapshotError);
    expect(() => parseSnapshot('{')).toThrow(/^invalid JSON: /);
  });

  it('reports schema issues with their paths', () => {
    expect(() => parseSnapshot(JSON.stringify({ frames: [{ file: '/app/main.ts', line: 0 }] }))).toThrow(
      /^invalid snapshot: frames\.0\.line: /
    );
    expect(() => parseSnapshot(JSON.stringify({ frames: [] }))).toThrow(/^invalid snapshot: frames: /);
  });
});
