/**
 * Error types for schema configuration
 *
 * Validation failures are reported as values. These are thrown only for
 * programmer errors: malformed descriptors and bad schema definitions.
 */

/**
 * Base class for record-schema errors
 */
export abstract class RecordSchemaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when a type descriptor does not follow the grammar
 */
export class DescriptorParseError extends RecordSchemaError {
  /** The descriptor that failed to parse */
  readonly descriptor: string;
  /** Character offset where parsing stopped */
  readonly offset: number;

  constructor(message: string, descriptor: string, offset: number) {
    super(`${message} in descriptor '${descriptor}' at offset ${offset}`);
    this.descriptor = descriptor;
    this.offset = offset;
  }
}

/**
 * Thrown when a schema definition is malformed
 */
export class SchemaDefinitionError extends RecordSchemaError {
  readonly schema: string | null;
  readonly field: string | null;

  constructor(
    message: string,
    schema: string | null = null,
    field: string | null = null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.schema = schema;
    this.field = field;
  }
}

export class DuplicateSchemaError extends RecordSchemaError {
  constructor(readonly schema: string) {
    super(`Schema '${schema}' is already registered`);
  }
}

export class UnknownSchemaError extends RecordSchemaError {
  constructor(readonly schema: string) {
    super(`Schema '${schema}' is not registered`);
  }
}

/**
 * Extract just the error message from an unknown error value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
