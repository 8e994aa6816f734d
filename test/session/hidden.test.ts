/**
 * Unit tests for the hidden frame predicate
 */

import { describe, it, expect } from 'vitest';
import { createHiddenPredicate, globToRegExp, isLibraryFile } from '../../src/session/hidden.js';
import type { Frame } from '../../src/frames/frame.js';

function frame(overrides: Partial<Frame> = {}): Frame {
  return { file: '/app/src/a.ts', line: 1, functionName: 'f', locals: {}, caller: null, ...overrides };
}

describe('globToRegExp', () => {
  it('translates wildcards', () => {
    expect(globToRegExp('app.*').test('app.orders')).toBe(true);
    expect(globToRegExp('app.*').test('lib.app')).toBe(false);
    expect(globToRegExp('v?').test('v1')).toBe(true);
    expect(globToRegExp('m[0-9]').test('m7')).toBe(true);
    expect(globToRegExp('m[!0-9]').test('m7')).toBe(false);
  });
});

describe('isLibraryFile', () => {
  it('matches runtime and node_modules files', () => {
    expect(isLibraryFile('node:internal/timers')).toBe(true);
    expect(isLibraryFile('/app/node_modules/express/lib/router.js')).toBe(true);
    expect(isLibraryFile('/app/src/a.ts')).toBe(false);
  });
});

describe('createHiddenPredicate', () => {
  const predicate = createHiddenPredicate({ enabled: true, skipModules: ['vendor.*'] });

  it('reports why a frame is hidden', () => {
    expect(predicate(frame({ hidden: true }))).toBe('marked');
    expect(predicate(frame({ module: 'vendor.http' }))).toBe('skipped-module');
    expect(predicate(frame({ locals: { __tracebackhide__: true } }))).toBe('traceback-hide');
    expect(predicate(frame({ file: '/app/node_modules/x/index.js' }))).toBe('library');
    expect(predicate(frame())).toBeNull();
  });

  it('ignores a falsy __tracebackhide__', () => {
    expect(predicate(frame({ locals: { __tracebackhide__: false } }))).toBeNull();
  });

  it('consults the hook last', () => {
    const withHook = createHiddenPredicate({
      enabled: true,
      skipModules: [],
      isHidden: (f) => f.functionName.startsWith('_'),
    });
    expect(withHook(frame({ functionName: '_internal' }))).toBe('hook');
  });

  it('hides nothing when disabled', () => {
    const disabled = createHiddenPredicate({ enabled: false, skipModules: ['*'] });
    expect(disabled(frame({ hidden: true }))).toBeNull();
  });
});
