/**
 * Parsed form of a type descriptor string.
 *
 * A descriptor reduces, after its optional `?`, to exactly one TypeNode.
 */

export type PrimitiveName = 'String' | 'int' | 'float' | 'bool' | 'Date' | 'Bytes';

export const PRIMITIVE_NAMES: readonly PrimitiveName[] = [
  'String',
  'int',
  'float',
  'bool',
  'Date',
  'Bytes',
];

export interface PrimitiveType {
  kind: 'primitive';
  name: PrimitiveName;
  /** Name as written, which may differ from `name` in case */
  written: string;
}

export interface ArrayType {
  kind: 'array';
  /** null for a bare `Array` whose elements are unchecked */
  element: Descriptor | null;
}

export interface DictionaryType {
  kind: 'dictionary';
}

export interface SchemaRefType {
  kind: 'schema';
  name: string;
}

export type TypeNode = PrimitiveType | ArrayType | DictionaryType | SchemaRefType;

export interface Descriptor {
  /** Source text of this descriptor, whitespace trimmed */
  text: string;
  nullable: boolean;
  type: TypeNode;
}
