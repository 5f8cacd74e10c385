// @record-schema/core - Runtime validation for schema-bound key/value records

// Validation
export * from './validation/validator.js';

// Descriptors
export * from './descriptor/ast.js';
export * from './descriptor/parser.js';

// Records
export * from './definitions.js';
export * from './record.js';
export * from './registry.js';
export * from './schema.js';

// Core
export * from './config.js';
export * from './diagnostics.js';
export * from './errors.js';
export * from './types.js';
export * from './utils.js';
export * from './value-kind.js';
