/**
 * Options Module
 *
 * Descriptor capability, typed option classes and value types
 */

export type {
  OptionKind,
  HelpEntry,
  OptionBase,
  KeywordDescriptor,
  PositionalDescriptor,
  OptionDescriptor,
} from './option-descriptor';
export { TypedOption } from './option-descriptor';

export type { KeywordOptionConfig } from './keyword-option';
export { KeywordOption } from './keyword-option';

export type { PositionalOptionConfig } from './positional-option';
export { PositionalOption } from './positional-option';

export type { ValueType } from './converters';
export {
  VARIADIC,
  scalarValue,
  schemaValue,
  stringValue,
  flagValue,
  integerValue,
  numberValue,
  choiceValue,
  listValue,
  restValue,
} from './converters';
