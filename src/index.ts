/**
 * signature-records public API.
 *
 * Declaring records:
 *   import { record, recordFromSource, param, kw } from 'signature-records';
 *
 * Working with instances:
 *   import { equals, hash, repr, reconstruct } from 'signature-records';
 */

// Declaration
export { record, recordFromSource } from './record.js';
export { parseDeclaration } from './source.js';
export type { ParsedDeclaration } from './source.js';
export type { RecordOptions, SourceOptions, Scope } from './config.js';

// Pipeline stages
export { extractSignature } from './extractor.js';
export { planLayout } from './layout.js';
export { exportMetadata } from './metadata.js';

// Instance protocol
export { equals, compareRecord, layoutSymbol, NOT_APPLICABLE } from './equality.js';
export type { Comparison } from './equality.js';
export { hash, hashTuple } from './hash.js';
export { repr, reprSymbol } from './repr.js';
export { reconstruct } from './reconstruct.js';
export { isRecord, isRecordType } from './registry.js';

// Errors
export {
  RecordError,
  SpecificationError,
  MissingArgumentError,
  TooManyArgumentsError,
  UnexpectedArgumentError,
  ImmutabilityError,
  HashError,
  ReconstructError,
} from './errors.js';
export { RecordErrorCode } from './types.js';

// Types
export type {
  ParameterKind,
  ParameterDescriptor,
  ExtractedSignature,
  AttributeLayout,
  LayoutEntry,
  StorageKind,
  ExportedMetadata,
  SequenceAnnotation,
  MappingAnnotation,
  RecordInstance,
  RecordMetadata,
  RecordProtocol,
  RecordType,
} from './types.js';

// User-facing API
export { param, kw, NamedArguments } from './api/index.js';
export type { FieldsOf, FieldValue, InstanceOf, ParameterOptions, CollectorOptions } from './api/index.js';
