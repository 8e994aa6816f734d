/**
 * Hidden Frame Predicate
 *
 * Decides which frames navigation and display skip over.
 */

import type { Frame } from '../frames/frame.js';

/** Files that belong to the runtime or to installed libraries */
const LIBRARY_PATTERNS = [/^node:/, /[\\/]node_modules[\\/]/, /^internal[\\/]/, /^<anonymous>$/];

export const TRACEBACK_HIDE = '__tracebackhide__';

export const HIDDEN_FRAMES_HINT = "(try 'help hidden_frames')";

export type HiddenReason = 'marked' | 'skipped-module' | 'traceback-hide' | 'library' | 'hook';

export interface HiddenPredicateOptions {
  enabled: boolean;
  skipModules: string[];
  isHidden?: (frame: Frame) => boolean;
}

export type HiddenPredicate = (frame: Frame) => HiddenReason | null;

/**
 * Translate a shell-style glob (`*`, `?`, `[...]`) into an anchored regex.
 */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = glob.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
      } else {
        let body = glob.slice(i + 1, close);
        if (body.startsWith('!')) {
          body = '^' + body.slice(1);
        }
        source += `[${body.replace(/\\/g, '\\\\')}]`;
        i = close;
      }
    } else {
      source += ch.replace(/[.+^${}()|\\/]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

export function isLibraryFile(file: string): boolean {
  return LIBRARY_PATTERNS.some((pattern) => pattern.test(file));
}

export function createHiddenPredicate(options: HiddenPredicateOptions): HiddenPredicate {
  const skip = options.skipModules.map(globToRegExp);

  return (frame) => {
    if (!options.enabled) {
      return null;
    }
    if (frame.hidden) {
      return 'marked';
    }
    if (frame.module !== undefined && skip.some((pattern) => pattern.test(frame.module ?? ''))) {
      return 'skipped-module';
    }
    if (Object.prototype.hasOwnProperty.call(frame.locals, TRACEBACK_HIDE) && frame.locals[TRACEBACK_HIDE]) {
      return 'traceback-hide';
    }
    if (isLibraryFile(frame.file)) {
      return 'library';
    }
    if (options.isHidden?.(frame)) {
      return 'hook';
    }
    return null;
  };
}
