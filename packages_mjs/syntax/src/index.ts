export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './format-spec.js';
export { tokenize, type Token, type LiteralToken, type FieldToken } from './tokenizer.js';
export { parseField, DEFAULT_ATTR, CONSTRAINT_OPEN } from './field-parser.js';
export { parseTemplate, isField, fieldsOf, fieldKeys } from './template.js';
