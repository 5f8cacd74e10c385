/**
 * RecordSchema - a named schema split into base and extension fields
 *
 * The base component is fixed by the schema's author. The extension store
 * is shared by every record bound to this schema, so extending it changes
 * what all of them validate against from then on.
 */

import type { Descriptor } from './descriptor/ast.js';
import { isSchemaReference, parseDescriptor, SCHEMA_MARKER } from './descriptor/parser.js';
import { DescriptorParseError, SchemaDefinitionError } from './errors.js';
import type { SchemaFields } from './types.js';
import { hasOwn } from './utils.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type SchemaDefinition = {
  name: string;
  fields: SchemaFields;
  description?: string;
  extendable?: boolean; // default: true
};

export type FieldOrigin = 'base' | 'extension';

/** Introspection of one effective field */
export type FieldInfo = {
  type: string;
  isNullable: boolean;
  isArray: boolean;
  /** Element descriptor for typed arrays, null otherwise */
  elementType: string | null;
  origin: FieldOrigin;
};

export type SchemaDescription = {
  name: string;
  description: string | null;
  isExtendable: boolean;
  baseFields: string[];
  fields: Record<string, FieldInfo>;
};

export class RecordSchema {
  readonly name: string;
  readonly description: string | null;
  readonly extendable: boolean;
  private readonly base: SchemaFields;
  private extension: SchemaFields = {};

  constructor(definition: SchemaDefinition) {
    // Only names the descriptor grammar can reference are accepted
    if (!IDENTIFIER.test(definition.name) || !isSchemaReference(definition.name)) {
      throw new SchemaDefinitionError(
        `Invalid schema name '${definition.name}': expected '${SCHEMA_MARKER}' followed by an upper-case letter`,
        definition.name,
      );
    }
    this.name = definition.name;
    this.description = definition.description ?? null;
    this.extendable = definition.extendable ?? true;
    this.base = { ...checkFields(definition.name, definition.fields) };
  }

  /**
   * Effective schema: base merged with extensions, extension winning on collision
   */
  fields(): SchemaFields {
    return { ...this.base, ...this.extension };
  }

  baseFields(): SchemaFields {
    return { ...this.base };
  }

  extensionFields(): SchemaFields {
    return { ...this.extension };
  }

  hasField(field: string): boolean {
    return hasOwn(this.extension, field) || hasOwn(this.base, field);
  }

  descriptorFor(field: string): string | undefined {
    if (hasOwn(this.extension, field)) return this.extension[field];
    if (hasOwn(this.base, field)) return this.base[field];
    return undefined;
  }

  /**
   * Merge fields into the extension store.
   * @returns false when the schema is not extendable
   * @throws SchemaDefinitionError when a field name or descriptor is invalid; nothing is merged
   */
  extend(extra: SchemaFields): boolean {
    if (!this.extendable) {
      return false;
    }
    this.extension = { ...this.extension, ...checkFields(this.name, extra) };
    return true;
  }

  describe(): SchemaDescription {
    const fields: Record<string, FieldInfo> = {};
    for (const [field, type] of Object.entries(this.fields())) {
      const descriptor = parseDescriptor(type);
      const element = descriptor.type.kind === 'array' ? descriptor.type.element : null;
      fields[field] = {
        type,
        isNullable: descriptor.nullable,
        isArray: descriptor.type.kind === 'array',
        elementType: element ? element.text : null,
        origin: hasOwn(this.extension, field) ? 'extension' : 'base',
      };
    }

    return {
      name: this.name,
      description: this.description,
      isExtendable: this.extendable,
      baseFields: Object.keys(this.base),
      fields,
    };
  }
}

/**
 * Every field name must be non-empty and every descriptor must parse
 */
function checkFields(schema: string, fields: SchemaFields): SchemaFields {
  const checked: SchemaFields = {};
  for (const [field, type] of Object.entries(fields)) {
    if (field.length === 0) {
      throw new SchemaDefinitionError(`Schema '${schema}' has an empty field name`, schema, field);
    }
    checked[field] = type;
    parseField(schema, field, type);
  }
  return checked;
}

function parseField(schema: string, field: string, type: string): Descriptor {
  try {
    return parseDescriptor(type);
  } catch (err) {
    if (err instanceof DescriptorParseError) {
      throw new SchemaDefinitionError(`Invalid type for ${schema}.${field}: ${err.message}`, schema, field, {
        cause: err,
      });
    }
    throw err;
  }
}
