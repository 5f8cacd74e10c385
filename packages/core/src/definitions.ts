/**
 * Schema definition documents
 *
 * Schemas can be authored as YAML (or JSON):
 *
 *   schemas:
 *     IPlayer:
 *       description: A playable character
 *       fields:
 *         name: String
 *         inventory: Array<IItem>
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { errorMessage, SchemaDefinitionError } from './errors.js';
import type { SchemaDefinition } from './schema.js';
import { RecordSchema } from './schema.js';

const definitionShape = z
  .object({
    description: z.string().optional(),
    extendable: z.boolean().optional(),
    fields: z.record(z.string().min(1), z.string().min(1)).default({}),
  })
  .strict();

const documentShape = z
  .object({
    schemas: z.record(z.string().min(1), definitionShape),
  })
  .strict();

export type SchemaDocument = z.infer<typeof documentShape>;

/**
 * Parse a definition document into schema definitions, in document order.
 * @throws SchemaDefinitionError on YAML syntax errors, shape errors or malformed descriptors
 */
export function parseSchemaDocument(text: string): SchemaDefinition[] {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new SchemaDefinitionError(`Invalid schema document: ${errorMessage(err)}`, null, null, {
      cause: err,
    });
  }

  const parsed = documentShape.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const [, schema, , field] = issue.path;
    const location = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SchemaDefinitionError(
      `Invalid schema document${location}: ${issue.message}`,
      typeof schema === 'string' ? schema : null,
      typeof field === 'string' ? field : null,
    );
  }

  const definitions: SchemaDefinition[] = [];
  for (const [name, definition] of Object.entries(parsed.data.schemas)) {
    const result: SchemaDefinition = { name, fields: definition.fields };
    if (definition.description !== undefined) result.description = definition.description;
    if (definition.extendable !== undefined) result.extendable = definition.extendable;

    // Constructing checks names and descriptors
    new RecordSchema(result);
    definitions.push(result);
  }
  return definitions;
}
