/**
 * Editor Hand-off
 *
 * Resolves the editor command for `edit` and builds the shell line that opens
 * a file at a line.
 */

import { spawnSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigurationError, EvaluationError } from '../session/errors.js';

export const NO_EDITOR_MESSAGE = 'Could not detect editor. Configure it or set $EDITOR.';

export interface EditTarget {
  file: string;
  line: number;
}

/**
 * Find an executable on PATH.
 */
export function findOnPath(name: string, envPath: string = process.env.PATH ?? ''): string | undefined {
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}

/**
 * Editor from configuration, then $EDITOR, then vim or vi on PATH.
 */
export function resolveEditor(
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  which: (name: string) => string | undefined = (name) => findOnPath(name, env.PATH)
): string {
  if (configured) {
    return configured;
  }
  if (env.EDITOR) {
    return env.EDITOR;
  }
  for (const name of ['vim', 'vi']) {
    const found = which(name);
    if (found) {
      return found;
    }
  }
  throw new ConfigurationError(NO_EDITOR_MESSAGE);
}

export function shellQuote(text: string): string {
  if (text === '') {
    return "''";
  }
  if (/^[\w@%+=:,./-]+$/.test(text)) {
    return text;
  }
  return `'${text.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Shell line opening `target`; `{filename}` and `{lineno}` placeholders take
 * precedence over the `editor +line file` form.
 */
export function buildEditorCommand(editor: string, target: EditTarget): string {
  const filename = shellQuote(target.file);
  if (editor.includes('{filename}') || editor.includes('{lineno}')) {
    return editor.replace(/\{filename\}/g, filename).replace(/\{lineno\}/g, String(target.line));
  }
  return `${editor} +${target.line} ${filename}`;
}

/**
 * Parse an `edit` argument against the current location.
 */
export function parseEditTarget(arg: string, current: EditTarget): EditTarget {
  const text = arg.trim();
  if (text === '') {
    return current;
  }
  if (/^\d+$/.test(text)) {
    return { file: current.file, line: parseInt(text, 10) };
  }
  const colon = text.lastIndexOf(':');
  if (colon === -1) {
    return { file: text, line: 1 };
  }
  const file = text.slice(0, colon);
  const lineText = text.slice(colon + 1);
  if (!file || !/^\d+$/.test(lineText)) {
    throw new EvaluationError('could not parse filename/lineno');
  }
  return { file, line: parseInt(lineText, 10) };
}

export function spawnEditor(command: string): void {
  const result = spawnSync(command, { shell: true, stdio: 'inherit' });
  if (result.error) {
    throw result.error;
  }
}
