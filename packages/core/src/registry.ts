import { parseSchemaDocument } from './definitions.js';
import { DuplicateSchemaError, UnknownSchemaError } from './errors.js';
import { ValidatedRecord } from './record.js';
import { RecordSchema, type SchemaDefinition, type SchemaDescription } from './schema.js';
import type { CreateOptions, CreateResult, SchemaResolver, ValidationMode } from './types.js';
import { Validator, type ValidatorOptions } from './validation/validator.js';

export type RegistryDescription = {
  schemas: string[];
  definitions: Record<string, SchemaDescription>;
};

/**
 * Named schemas and the validator that resolves references to them
 */
export class SchemaRegistry implements SchemaResolver {
  private schemas = new Map<string, RecordSchema>();
  private _validator: Validator | null = null;

  constructor(private readonly options: ValidatorOptions = {}) {}

  /** Validator resolving schema references through this registry */
  get validator(): Validator {
    if (!this._validator) {
      this._validator = new Validator(this, this.options);
    }
    return this._validator;
  }

  define(definition: SchemaDefinition): RecordSchema {
    return this.register(new RecordSchema(definition));
  }

  register(schema: RecordSchema): RecordSchema {
    if (this.schemas.has(schema.name)) {
      throw new DuplicateSchemaError(schema.name);
    }
    this.schemas.set(schema.name, schema);
    return schema;
  }

  /**
   * Define every schema in a YAML or JSON document. Nothing is registered
   * unless the whole document is valid.
   */
  load(text: string): RecordSchema[] {
    const definitions = parseSchemaDocument(text);
    for (const definition of definitions) {
      if (this.schemas.has(definition.name)) {
        throw new DuplicateSchemaError(definition.name);
      }
    }
    return definitions.map((definition) => this.define(definition));
  }

  get(name: string): RecordSchema | undefined {
    return this.schemas.get(name);
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  names(): string[] {
    return [...this.schemas.keys()];
  }

  getAll(): Map<string, RecordSchema> {
    return new Map(this.schemas); // Return copy for immutability
  }

  /**
   * Construct a record of the named schema. Invalid data leaves it empty and 'rejected'.
   * @throws UnknownSchemaError
   */
  create(name: string, data: Record<string, unknown> = {}, mode: ValidationMode = 'loose'): ValidatedRecord {
    return new ValidatedRecord(this.require(name), data, { mode, validator: this.validator });
  }

  /**
   * @throws UnknownSchemaError
   */
  tryCreate(
    name: string,
    data: Record<string, unknown> = {},
    mode: ValidationMode = 'loose',
    options: CreateOptions = {},
  ): CreateResult<ValidatedRecord> {
    return ValidatedRecord.tryCreate(this.require(name), data, {
      mode,
      validator: this.validator,
      quiet: options.quiet,
    });
  }

  describeAll(): RegistryDescription {
    const definitions: Record<string, SchemaDescription> = {};
    const schemas = this.names().sort();
    for (const name of schemas) {
      definitions[name] = this.require(name).describe();
    }
    return { schemas, definitions };
  }

  private require(name: string): RecordSchema {
    const schema = this.schemas.get(name);
    if (!schema) {
      throw new UnknownSchemaError(name);
    }
    return schema;
  }
}
