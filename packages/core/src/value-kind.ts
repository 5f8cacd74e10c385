/**
 * Runtime classification of values.
 *
 * Every value maps to exactly one tag, and every tag to a display name used in
 * diagnostics and for primitive descriptor matching.
 */

import { isRecordInstance, type RecordInstance } from './types.js';
import { isPlainObject } from './utils.js';

export type ValueKind =
  | { tag: 'null' }
  | { tag: 'bool'; value: boolean }
  | { tag: 'int'; value: number | bigint }
  | { tag: 'float'; value: number }
  | { tag: 'string'; value: string }
  | { tag: 'date'; value: Date }
  | { tag: 'bytes'; value: Uint8Array }
  | { tag: 'array'; items: readonly unknown[] }
  | { tag: 'map'; value: Record<string, unknown> | Map<unknown, unknown> }
  | { tag: 'record'; record: RecordInstance }
  | { tag: 'other'; value: unknown };

export type KindTag = ValueKind['tag'];

/** Display names; records display as their schema name instead */
export const KIND_NAMES: Record<Exclude<KindTag, 'record'>, string> = {
  null: 'null',
  bool: 'bool',
  int: 'int',
  float: 'float',
  string: 'String',
  date: 'Date',
  bytes: 'Bytes',
  array: 'Array',
  map: 'Dictionary',
  other: 'Object',
};

export function classify(value: unknown): ValueKind {
  if (value === null || value === undefined) return { tag: 'null' };
  if (typeof value === 'boolean') return { tag: 'bool', value };
  if (typeof value === 'bigint') return { tag: 'int', value };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { tag: 'int', value } : { tag: 'float', value };
  }
  if (typeof value === 'string') return { tag: 'string', value };
  if (Array.isArray(value)) return { tag: 'array', items: value };
  if (value instanceof Date) return { tag: 'date', value };
  if (value instanceof Uint8Array) return { tag: 'bytes', value };
  if (isRecordInstance(value)) return { tag: 'record', record: value };
  if (value instanceof Map || isPlainObject(value)) return { tag: 'map', value };
  return { tag: 'other', value };
}

export function kindName(kind: ValueKind): string {
  return kind.tag === 'record' ? kind.record.schemaName : KIND_NAMES[kind.tag];
}

/**
 * Display name of a value's runtime kind
 */
export function kindOf(value: unknown): string {
  return kindName(classify(value));
}
