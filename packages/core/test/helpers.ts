import { MemorySink } from '../src/diagnostics.js';
import type { SchemaResolver } from '../src/types.js';
import { Validator, type ValidatorOptions } from '../src/validation/validator.js';

/**
 * Validator whose diagnostics land in memory instead of the console
 */
export function createTestValidator(
  options: ValidatorOptions = {},
  resolver?: SchemaResolver,
): { validator: Validator; sink: MemorySink } {
  const sink = new MemorySink();
  const validator = new Validator(resolver, { environment: 'test', sink, ...options });
  return { validator, sink };
}
