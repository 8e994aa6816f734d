/**
 * Frame Evaluator
 *
 * Evaluates expressions and runs statements against a frame's locals. Free
 * names resolve to the frame's locals first, then to globals; assignments and
 * `var` declarations write into the frame's locals.
 */

import ts from 'typescript';
import type { Frame } from '../frames/frame.js';

export interface Evaluator {
  evaluate(source: string, frame: Frame): unknown;
  execute(source: string, frame: Frame): void;
}

export type SourceKind = 'expression' | 'statements';

function isAssignment(expression: ts.Expression): boolean {
  if (ts.isBinaryExpression(expression)) {
    const op = expression.operatorToken.kind;
    return op >= ts.SyntaxKind.FirstAssignment && op <= ts.SyntaxKind.LastAssignment;
  }
  if (ts.isPrefixUnaryExpression(expression) || ts.isPostfixUnaryExpression(expression)) {
    return (
      expression.operator === ts.SyntaxKind.PlusPlusToken ||
      expression.operator === ts.SyntaxKind.MinusMinusToken
    );
  }
  return false;
}

/**
 * A single non-assigning expression prints its value; anything else runs as statements.
 */
export function classifySource(source: string): SourceKind {
  const sourceFile = ts.createSourceFile('input.ts', source, ts.ScriptTarget.Latest, false, ts.ScriptKind.TS);
  const statements = sourceFile.statements;
  if (statements.length !== 1) {
    return 'statements';
  }
  const [statement] = statements;
  if (!ts.isExpressionStatement(statement) || isAssignment(statement.expression)) {
    return 'statements';
  }
  return source.trimEnd().endsWith(';') ? 'statements' : 'expression';
}

function scopeFor(frame: Frame): Record<string, unknown> {
  const locals = frame.locals;
  return new Proxy(locals, {
    has: (_target, key) => typeof key === 'string',
    get: (_target, key) => {
      if (typeof key !== 'string') {
        return undefined;
      }
      if (key in locals) {
        return locals[key];
      }
      if (key in globalThis) {
        return Reflect.get(globalThis, key);
      }
      throw new ReferenceError(`${key} is not defined`);
    },
    set: (_target, key, value: unknown) => {
      if (typeof key !== 'string') {
        return false;
      }
      locals[key] = value;
      return true;
    },
  });
}

type ScopedFunction = (scope: Record<string, unknown>) => unknown;

function compile(body: string): ScopedFunction {
  const fn: unknown = new Function('__scope__', `with (__scope__) {\n${body}\n}`);
  if (typeof fn !== 'function') {
    throw new TypeError('compiled source is not callable');
  }
  return (scope) => Reflect.apply(fn, undefined, [scope]);
}

export class FrameEvaluator implements Evaluator {
  evaluate(source: string, frame: Frame): unknown {
    return compile(`return (${source}\n);`)(scopeFor(frame));
  }

  execute(source: string, frame: Frame): void {
    compile(source)(scopeFor(frame));
  }
}
