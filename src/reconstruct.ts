/**
 * Evaluate a textual representation back into a value.
 *
 *   const item = InventoryItem('Widget', 9.99);
 *   reconstruct(repr(item), { InventoryItem });   // equals(item, …) === true
 *
 * The text is parsed with the TypeScript parser and evaluated by walking
 * the AST; nothing is executed, and only names in `scope` are callable.
 */

import ts from 'typescript';
import type { Scope } from './config.js';
import { evaluateExpression } from './evaluate.js';
import { ReconstructError } from './errors.js';

const fail = (message: string): Error => new ReconstructError(`cannot reconstruct: ${message}`);

export function reconstruct(text: string, scope: Scope = {}): unknown {
  // Parenthesized so a leading `{` reads as an object literal, not a block.
  const sourceFile = ts.createSourceFile('repr.ts', `(${text}\n)`, ts.ScriptTarget.Latest, true);
  const [statement] = sourceFile.statements;
  if (
    sourceFile.statements.length !== 1 ||
    !ts.isExpressionStatement(statement) ||
    !ts.isParenthesizedExpression(statement.expression)
  ) {
    throw fail(`'${text}' is not a single expression`);
  }
  return evaluateExpression(statement.expression.expression, sourceFile, scope, fail);
}
