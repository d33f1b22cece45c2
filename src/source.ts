/**
 * Read a parameter specification from TypeScript source.
 *
 * The source holds exactly one function declaration. Its parameters map
 * onto parameter kinds:
 *
 *   function InventoryItem(
 *     name: string,                      // positional-or-named
 *     price: number,                     // positional-or-named
 *     ...tags: string[],                 // rest-positional (annotation 'string')
 *     { quantity = 0, ...extra }:        // named-only + rest-named
 *       { quantity?: number; [key: string]: unknown },
 *   ) {}
 *
 * The leading JSDoc comment is the docstring. Default values must be
 * literal expressions; they are evaluated, never executed.
 */

import ts from 'typescript';
import type { ParameterDescriptor } from './types.js';
import type { SourceOptions } from './config.js';
import { DEFAULT_SOURCE_FILE_NAME } from './config.js';
import { SpecificationError } from './errors.js';
import { evaluateExpression } from './evaluate.js';

export interface ParsedDeclaration {
  readonly name: string;
  readonly parameters: readonly ParameterDescriptor[];
  readonly doc: string | undefined;
}

interface ParseContext {
  readonly sourceFile: ts.SourceFile;
  readonly options: SourceOptions;
  readonly recordName: string;
}

function descriptor(
  name: string,
  kind: ParameterDescriptor['kind'],
  fields: { default?: { value: unknown }; annotation?: string },
): ParameterDescriptor {
  return Object.freeze({
    name,
    kind,
    hasDefault: fields.default !== undefined,
    ...(fields.default !== undefined ? { default: fields.default.value } : {}),
    ...(fields.annotation !== undefined ? { annotation: fields.annotation } : {}),
  });
}

// ── Defaults & annotations ──────────────────────────────────────────────

function evaluateDefault(
  parameterName: string,
  initializer: ts.Expression,
  ctx: ParseContext,
): { value: unknown } {
  const fail = (message: string): Error =>
    new SpecificationError(`${ctx.recordName}: default for '${parameterName}' is not a literal: ${message}`);
  return { value: evaluateExpression(initializer, ctx.sourceFile, ctx.options.scope, fail) };
}

function defaultOf(
  parameterName: string,
  initializer: ts.Expression | undefined,
  optional: boolean,
  ctx: ParseContext,
): { value: unknown } | undefined {
  if (initializer) return evaluateDefault(parameterName, initializer, ctx);
  return optional ? { value: undefined } : undefined;
}

/** Element type of a rest parameter's array annotation. */
function restElementType(type: ts.TypeNode, sourceFile: ts.SourceFile): string {
  if (ts.isArrayTypeNode(type)) return type.elementType.getText(sourceFile);
  if (
    ts.isTypeOperatorNode(type) &&
    type.operator === ts.SyntaxKind.ReadonlyKeyword &&
    ts.isArrayTypeNode(type.type)
  ) {
    return type.type.elementType.getText(sourceFile);
  }
  if (
    ts.isTypeReferenceNode(type) &&
    ts.isIdentifier(type.typeName) &&
    (type.typeName.text === 'Array' || type.typeName.text === 'ReadonlyArray') &&
    type.typeArguments?.length === 1
  ) {
    return type.typeArguments[0].getText(sourceFile);
  }
  return type.getText(sourceFile);
}

interface MemberTypes {
  readonly members: ReadonlyMap<string, { type: string | undefined; optional: boolean }>;
  readonly indexValue: string | undefined;
}

function memberTypesOf(type: ts.TypeNode | undefined, sourceFile: ts.SourceFile): MemberTypes {
  const members = new Map<string, { type: string | undefined; optional: boolean }>();
  let indexValue: string | undefined;
  if (type && ts.isTypeLiteralNode(type)) {
    for (const member of type.members) {
      if (ts.isPropertySignature(member) && (ts.isIdentifier(member.name) || ts.isStringLiteral(member.name))) {
        members.set(member.name.text, {
          type: member.type?.getText(sourceFile),
          optional: member.questionToken !== undefined,
        });
      } else if (ts.isIndexSignatureDeclaration(member)) {
        indexValue = member.type.getText(sourceFile);
      }
    }
  }
  return { members, indexValue };
}

// ── Parameters ──────────────────────────────────────────────────────────

function namedParameters(
  parameter: ts.ParameterDeclaration,
  pattern: ts.ObjectBindingPattern,
  ctx: ParseContext,
): ParameterDescriptor[] {
  const { recordName, sourceFile } = ctx;
  if (parameter.dotDotDotToken) {
    throw new SpecificationError(`${recordName}: a rest parameter cannot be a binding pattern`);
  }
  if (
    parameter.initializer &&
    !(ts.isObjectLiteralExpression(parameter.initializer) && parameter.initializer.properties.length === 0)
  ) {
    throw new SpecificationError(`${recordName}: named parameters may only default to '{}' as a whole`);
  }

  const { members, indexValue } = memberTypesOf(parameter.type, sourceFile);
  return pattern.elements.map((element) => {
    if (element.propertyName) {
      throw new SpecificationError(`${recordName}: renamed binding '${element.getText(sourceFile)}' is not supported`);
    }
    if (!ts.isIdentifier(element.name)) {
      throw new SpecificationError(`${recordName}: nested binding '${element.getText(sourceFile)}' is not supported`);
    }
    const name = element.name.text;
    if (element.dotDotDotToken) {
      return descriptor(name, 'rest-named', { annotation: indexValue });
    }
    const member = members.get(name);
    return descriptor(name, 'named-only', {
      default: defaultOf(name, element.initializer, member?.optional ?? false, ctx),
      annotation: member?.type,
    });
  });
}

function parametersOf(fn: ts.FunctionDeclaration, ctx: ParseContext): ParameterDescriptor[] {
  const { recordName, sourceFile } = ctx;
  const result: ParameterDescriptor[] = [];

  for (const parameter of fn.parameters) {
    if (ts.isObjectBindingPattern(parameter.name)) {
      result.push(...namedParameters(parameter, parameter.name, ctx));
      continue;
    }
    if (!ts.isIdentifier(parameter.name)) {
      throw new SpecificationError(`${recordName}: array binding patterns are not supported`);
    }

    const name = parameter.name.text;
    if (name === 'this') {
      throw new SpecificationError(`${recordName}: a 'this' parameter is not supported`);
    }
    if (parameter.dotDotDotToken) {
      if (parameter.initializer) {
        throw new SpecificationError(`${recordName}: rest parameter '${name}' cannot have a default`);
      }
      result.push(
        descriptor(name, 'rest-positional', {
          annotation: parameter.type ? restElementType(parameter.type, sourceFile) : undefined,
        }),
      );
      continue;
    }
    result.push(
      descriptor(name, 'positional-or-named', {
        default: defaultOf(name, parameter.initializer, parameter.questionToken !== undefined, ctx),
        annotation: parameter.type?.getText(sourceFile),
      }),
    );
  }

  return result;
}

// ── Declaration ─────────────────────────────────────────────────────────

function docOf(fn: ts.FunctionDeclaration): string | undefined {
  const docs = ts.getJSDocCommentsAndTags(fn).filter(ts.isJSDoc);
  const last = docs[docs.length - 1];
  if (!last) return undefined;
  return ts.getTextOfJSDocComment(last.comment);
}

export function parseDeclaration(text: string, options: SourceOptions = {}): ParsedDeclaration {
  const sourceFile = ts.createSourceFile(
    options.fileName ?? DEFAULT_SOURCE_FILE_NAME,
    text,
    ts.ScriptTarget.Latest,
    true,
  );

  const functions = sourceFile.statements.filter(ts.isFunctionDeclaration);
  if (functions.length !== 1) {
    throw new SpecificationError(`expected exactly one function declaration, found ${functions.length}`);
  }
  const [fn] = functions;
  if (!fn.name) {
    throw new SpecificationError('the function declaration must be named');
  }
  const recordName = fn.name.text;

  if (fn.type && fn.type.kind !== ts.SyntaxKind.VoidKeyword) {
    throw new SpecificationError(`${recordName}: return type annotation can only be 'void' or unset`);
  }

  const parameters = parametersOf(fn, { sourceFile, options, recordName });
  return Object.freeze({ name: recordName, parameters: Object.freeze(parameters), doc: docOf(fn) });
}
