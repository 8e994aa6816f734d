/**
 * Unit tests for session options
 */

import { describe, it, expect } from 'vitest';
import { promptForDepth, resolveOptions } from '../../src/session/options.js';
import { ConfigurationError } from '../../src/session/errors.js';

describe('resolveOptions', () => {
  it('fills defaults', () => {
    expect(resolveOptions()).toEqual({
      prompt: '# ',
      stickyByDefault: false,
      enableHiddenFrames: true,
      showHiddenFramesCount: true,
      tracebackLimit: 0,
      skipModules: [],
      headBias: 0.5,
      listWindow: 11,
      editor: undefined,
      interruptAs: undefined,
    });
  });

  it('maps traceback settings to a limit', () => {
    expect(resolveOptions({ showTracebackOnError: true }).tracebackLimit).toBe(Infinity);
    expect(resolveOptions({ showTracebackOnError: { limit: 3 } }).tracebackLimit).toBe(3);
  });

  it('rejects invalid values', () => {
    expect(() => resolveOptions({ headBias: 1.5 })).toThrow(ConfigurationError);
    expect(() => resolveOptions({ listWindow: 0 })).toThrow('listWindow must be a positive integer, got 0');
    expect(() => resolveOptions({ prompt: '  ' })).toThrow(ConfigurationError);
    expect(() => resolveOptions({ showTracebackOnError: { limit: -1 } })).toThrow(ConfigurationError);
  });
});

describe('promptForDepth', () => {
  it('wraps the prompt in one parenthesis layer per level', () => {
    expect(promptForDepth('# ', 0)).toBe('# ');
    expect(promptForDepth('# ', 1)).toBe('(#) ');
    expect(promptForDepth('# ', 2)).toBe('((#)) ');
    expect(promptForDepth('# ', 3)).toBe('(((#))) ');
  });

  it('works with custom prompts', () => {
    expect(promptForDepth('dbg> ', 1)).toBe('(dbg>) ');
  });
});
