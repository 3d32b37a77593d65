/**
 * textbase: declarative documents stored as plain text.
 *
 * A document type declares typed fields; documents keep their field values
 * in folded `name: value` headers followed by a blank line and a free-text
 * body.
 *
 * @example
 * ```ts
 * import { defineDocument, TextField, IntField } from 'textbase';
 *
 * const Person = defineDocument({
 *   name: new TextField({ required: true }),
 *   age: new IntField(),
 * });
 *
 * const person = Person.create({ name: 'Ada', age: 36 });
 * person.write('Notes...\n');
 * person.validate();
 * person.save('ada.txt');
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  Defaulter,
  FieldInfo,
  FieldMap,
  FieldOptions,
  FieldSlot,
  FoldOptions,
  Header,
  ParsedHeader,
  ParsedText,
  Validator,
  Values,
} from './types.js';

// Errors
export {
  DocumentError,
  ConstructionError,
  ValidationError,
  ConversionError,
  PathError,
  FormatError,
  DefinitionError,
  InvalidDocument,
} from './errors.js';

// Fields
export { Field } from './field.js';
export { TextField, IntField, BoolField, DateTimeField, TagField, UuidField } from './fields.js';
export type { DateTimeFieldOptions, UuidFieldOptions } from './fields.js';

// Validators
export { required, uuid, tagSequence, maxLength, matches } from './validators.js';

// Documents
export { DocumentType, defineDocument } from './document-type.js';
export type { DocumentOf } from './document-type.js';
export { Document } from './document.js';

// Codec
export {
  WRAP_WIDTH,
  CONTINUATION_INDENT,
  fold,
  unfold,
  splitText,
  parseHeaders,
  parseText,
  renderText,
} from './codec.js';
