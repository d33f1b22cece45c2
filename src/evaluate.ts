/**
 * Literal expression evaluator over the TypeScript AST.
 *
 * Reads the value forms repr() writes (and default values in source
 * declarations) without executing code: literals, array and object
 * literals, `new Map/Set/Date`, names from a scope, and calls of record
 * types in that scope with `name=value` named arguments.
 */

import ts from 'typescript';
import type { Scope } from './config.js';
import { lookupScope } from './config.js';
import { NamedArguments } from './api/kw.js';
import { isRecordType } from './registry.js';

export type ErrorFactory = (message: string) => Error;

interface EvaluationContext {
  readonly sourceFile: ts.SourceFile;
  readonly scope: Scope | undefined;
  readonly fail: ErrorFactory;
}

const BUILTIN_VALUES: ReadonlyMap<string, unknown> = new Map<string, unknown>([
  ['undefined', undefined],
  ['NaN', Number.NaN],
  ['Infinity', Number.POSITIVE_INFINITY],
]);

function isPlainObject(value: unknown): value is object {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function setEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

// ── Names ───────────────────────────────────────────────────────────────

function propertyKey(name: ts.PropertyName, ctx: EvaluationContext): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  throw ctx.fail(`unsupported property name '${name.getText(ctx.sourceFile)}'`);
}

function resolveName(name: string, ctx: EvaluationContext): unknown {
  if (BUILTIN_VALUES.has(name)) return BUILTIN_VALUES.get(name);
  const { found, value } = lookupScope(ctx.scope, name);
  if (!found) throw ctx.fail(`name '${name}' is not defined`);
  return value;
}

// ── Expressions ─────────────────────────────────────────────────────────

function evaluate(node: ts.Expression, ctx: EvaluationContext): unknown {
  if (ts.isParenthesizedExpression(node)) return evaluate(node.expression, ctx);
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return node.text;
  if (ts.isNumericLiteral(node)) return Number(node.text);
  if (ts.isBigIntLiteral(node)) return BigInt(node.text.slice(0, -1));

  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return true;
    case ts.SyntaxKind.FalseKeyword:
      return false;
    case ts.SyntaxKind.NullKeyword:
      return null;
  }

  if (ts.isPrefixUnaryExpression(node)) return evaluateSign(node, ctx);
  if (ts.isIdentifier(node)) return resolveName(node.text, ctx);
  if (ts.isArrayLiteralExpression(node)) return evaluateArray(node, ctx);
  if (ts.isObjectLiteralExpression(node)) return evaluateObject(node, ctx);
  if (ts.isNewExpression(node)) return evaluateNew(node, ctx);
  if (ts.isCallExpression(node)) return evaluateCall(node, ctx);

  throw ctx.fail(`unsupported expression '${node.getText(ctx.sourceFile)}'`);
}

function evaluateSign(node: ts.PrefixUnaryExpression, ctx: EvaluationContext): unknown {
  const operand = evaluate(node.operand, ctx);
  if (node.operator === ts.SyntaxKind.MinusToken) {
    if (typeof operand === 'number') return -operand;
    if (typeof operand === 'bigint') return -operand;
  } else if (node.operator === ts.SyntaxKind.PlusToken) {
    if (typeof operand === 'number') return operand;
  }
  throw ctx.fail(`unsupported expression '${node.getText(ctx.sourceFile)}'`);
}

function evaluateArray(node: ts.ArrayLiteralExpression, ctx: EvaluationContext): unknown[] {
  const items: unknown[] = [];
  for (const element of node.elements) {
    if (ts.isSpreadElement(element)) {
      const spread = evaluate(element.expression, ctx);
      if (!Array.isArray(spread)) throw ctx.fail('only arrays can be spread into an array');
      items.push(...spread);
    } else if (ts.isOmittedExpression(element)) {
      items.push(undefined);
    } else {
      items.push(evaluate(element, ctx));
    }
  }
  return items;
}

function evaluateObject(node: ts.ObjectLiteralExpression, ctx: EvaluationContext): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const property of node.properties) {
    if (ts.isPropertyAssignment(property)) {
      setEntry(result, propertyKey(property.name, ctx), evaluate(property.initializer, ctx));
    } else if (ts.isShorthandPropertyAssignment(property)) {
      setEntry(result, property.name.text, resolveName(property.name.text, ctx));
    } else if (ts.isSpreadAssignment(property)) {
      const spread = evaluate(property.expression, ctx);
      if (!isPlainObject(spread)) throw ctx.fail('only plain objects can be spread into an object');
      for (const [key, value] of Object.entries(spread)) setEntry(result, key, value);
    } else {
      throw ctx.fail(`unsupported object member '${property.getText(ctx.sourceFile)}'`);
    }
  }
  return result;
}

function evaluateNew(node: ts.NewExpression, ctx: EvaluationContext): unknown {
  const callee = ts.isIdentifier(node.expression) ? node.expression.text : '';
  const args = (node.arguments ?? []).map((arg) => evaluate(arg, ctx));
  const [first] = args;

  switch (callee) {
    case 'Map': {
      const entries: Array<[unknown, unknown]> = [];
      if (first !== undefined) {
        if (!Array.isArray(first)) throw ctx.fail('new Map() expects an array of entries');
        for (const entry of first) {
          if (!Array.isArray(entry) || entry.length !== 2) throw ctx.fail('new Map() entries must be [key, value] pairs');
          entries.push([entry[0], entry[1]]);
        }
      }
      return new Map(entries);
    }
    case 'Set': {
      if (first !== undefined && !Array.isArray(first)) throw ctx.fail('new Set() expects an array');
      return new Set(Array.isArray(first) ? first : []);
    }
    case 'Date': {
      if (typeof first !== 'string' && typeof first !== 'number') {
        throw ctx.fail('new Date() expects a string or a number');
      }
      return new Date(first);
    }
  }
  throw ctx.fail(`unsupported constructor '${node.expression.getText(ctx.sourceFile)}'`);
}

// ── Record calls ────────────────────────────────────────────────────────

function namedArgument(node: ts.Expression): { name: string; value: ts.Expression } | undefined {
  if (
    ts.isBinaryExpression(node) &&
    node.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
    ts.isIdentifier(node.left)
  ) {
    return { name: node.left.text, value: node.right };
  }
  return undefined;
}

function evaluateCall(node: ts.CallExpression, ctx: EvaluationContext): unknown {
  if (!ts.isIdentifier(node.expression)) {
    throw ctx.fail(`unsupported callee '${node.expression.getText(ctx.sourceFile)}'`);
  }
  const type = resolveName(node.expression.text, ctx);
  if (!isRecordType(type)) {
    throw ctx.fail(`'${node.expression.text}' is not a record type`);
  }

  const positional: unknown[] = [];
  const named: Array<[string, unknown]> = [];
  for (const arg of node.arguments) {
    const assignment = namedArgument(arg);
    if (assignment) {
      named.push([assignment.name, evaluate(assignment.value, ctx)]);
    } else if (ts.isSpreadElement(arg)) {
      const spread = evaluate(arg.expression, ctx);
      if (Array.isArray(spread)) {
        positional.push(...spread);
      } else if (isPlainObject(spread)) {
        named.push(...Object.entries(spread));
      } else {
        throw ctx.fail('only arrays and plain objects can be spread into a call');
      }
    } else if (named.length > 0) {
      throw ctx.fail('positional argument follows named argument');
    } else {
      positional.push(evaluate(arg, ctx));
    }
  }

  return named.length > 0 ? type(...positional, new NamedArguments(named)) : type(...positional);
}

// ── Entry ───────────────────────────────────────────────────────────────

export function evaluateExpression(
  node: ts.Expression,
  sourceFile: ts.SourceFile,
  scope: Scope | undefined,
  fail: ErrorFactory,
): unknown {
  return evaluate(node, { sourceFile, scope, fail });
}
