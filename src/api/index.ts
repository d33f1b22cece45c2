export { param } from './param.js';
export { kw, isNamedArguments, NamedArguments } from './kw.js';
export type {
  FieldValue,
  FieldsOf,
  InstanceOf,
  ParameterOptions,
  CollectorOptions,
} from './types.js';
