/**
 * Code Unit Locator
 *
 * Finds the function, method or class a frame is executing in, leading
 * decorators included, using the TypeScript parser. Sources the parser cannot
 * place fall back to indentation.
 */

import ts from 'typescript';

/** Line span of a code unit, 1-based and inclusive */
export interface CodeUnit {
  /** First line, decorators included */
  start: number;
  /** Line of the definition itself, after any decorators */
  definition: number;
  end: number;
  name: string;
}

export interface UnitQuery {
  line: number;
  functionName: string;
  firstLine?: number;
}

const MODULE_NAMES = new Set(['<module>', '<top>', '']);

function scriptKindFor(file: string): ts.ScriptKind {
  if (file.endsWith('.tsx')) return ts.ScriptKind.TSX;
  if (file.endsWith('.jsx')) return ts.ScriptKind.JSX;
  if (/\.[cm]?js$/.test(file)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

function nameOf(node: ts.Node): string {
  if (ts.isConstructorDeclaration(node)) {
    return 'constructor';
  }
  if (
    (ts.isFunctionDeclaration(node) ||
      ts.isFunctionExpression(node) ||
      ts.isClassDeclaration(node) ||
      ts.isMethodDeclaration(node) ||
      ts.isGetAccessorDeclaration(node) ||
      ts.isSetAccessorDeclaration(node)) &&
    node.name
  ) {
    return ts.isIdentifier(node.name) || ts.isPrivateIdentifier(node.name) ? node.name.text : node.name.getText();
  }
  const parent = node.parent;
  if (parent && (ts.isVariableDeclaration(parent) || ts.isPropertyAssignment(parent) || ts.isPropertyDeclaration(parent))) {
    return ts.isIdentifier(parent.name) ? parent.name.text : parent.name.getText();
  }
  return '<anonymous>';
}

function isUnitNode(node: ts.Node): boolean {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    ts.isClassDeclaration(node)
  );
}

/**
 * Statement a function expression is bound by, so `const f = () => {...}` spans the whole statement.
 */
function bindingStatement(node: ts.Node): ts.Node {
  if (!ts.isArrowFunction(node) && !ts.isFunctionExpression(node)) {
    return node;
  }
  const declaration = node.parent;
  if (declaration && ts.isVariableDeclaration(declaration) && declaration.initializer === node) {
    const list = declaration.parent;
    const statement = list.parent;
    if (ts.isVariableStatement(statement) && list.declarations.length === 1) {
      return statement;
    }
  }
  return node;
}

function unitFromNode(sourceFile: ts.SourceFile, node: ts.Node): CodeUnit {
  const text = sourceFile.text;
  const outer = bindingStatement(node);
  const lineOf = (pos: number) => sourceFile.getLineAndCharacterOfPosition(pos).line + 1;

  const start = outer.getStart(sourceFile);
  let definition = start;
  const decorators = ts.canHaveDecorators(node) ? ts.getDecorators(node) : undefined;
  if (decorators && decorators.length > 0) {
    definition = ts.skipTrivia(text, decorators[decorators.length - 1].end);
  }

  return {
    start: lineOf(start),
    definition: lineOf(definition),
    end: lineOf(outer.getEnd()),
    name: nameOf(node),
  };
}

/**
 * Locate the unit enclosing `query.line` in TypeScript or JavaScript source.
 *
 * Prefers a unit whose definition starts at `firstLine`, then the innermost unit
 * named `functionName`, then the innermost unit containing the line.
 */
export function locateUnit(file: string, lines: string[], query: UnitQuery): CodeUnit | undefined {
  if (MODULE_NAMES.has(query.functionName)) {
    return lines.length > 0 ? { start: 1, definition: 1, end: lines.length, name: '<module>' } : undefined;
  }

  const sourceFile = ts.createSourceFile(
    file,
    lines.join('\n'),
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(file)
  );

  const containing: CodeUnit[] = [];
  const visit = (node: ts.Node): void => {
    if (isUnitNode(node)) {
      const unit = unitFromNode(sourceFile, node);
      if (unit.start <= query.line && query.line <= unit.end) {
        containing.push(unit);
      }
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);

  // Innermost first
  containing.sort((a, b) => b.start - a.start || a.end - b.end);

  if (query.firstLine !== undefined) {
    const byFirstLine = containing.find(
      (unit) => unit.start === query.firstLine || unit.definition === query.firstLine
    );
    if (byFirstLine) {
      return byFirstLine;
    }
  }
  const byName = containing.find((unit) => unit.name === query.functionName);
  if (byName) {
    return byName;
  }
  if (containing.length > 0) {
    return containing[0];
  }
  if (query.firstLine !== undefined) {
    return unitByIndentation(lines, query.firstLine, query.functionName);
  }
  return undefined;
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Block starting at `firstLine`: every following line indented deeper, plus a
 * closing line at the same indentation.
 */
export function unitByIndentation(lines: string[], firstLine: number, name: string): CodeUnit | undefined {
  const head = lines[firstLine - 1];
  if (head === undefined) {
    return undefined;
  }
  const indent = indentOf(head);
  let end = firstLine;
  for (let i = firstLine; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === '') {
      continue;
    }
    if (indentOf(line) > indent) {
      end = i + 1;
      continue;
    }
    if (/^[)\]}]/.test(line.trimStart())) {
      end = i + 1;
    }
    break;
  }
  return { start: firstLine, definition: firstLine, end, name };
}
