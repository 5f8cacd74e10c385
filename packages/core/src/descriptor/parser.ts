import { DescriptorParseError } from '../errors.js';
import { PRIMITIVE_NAMES, type Descriptor, type PrimitiveName, type TypeNode } from './ast.js';

/** Schema references start with this letter followed by an upper-case letter (IPlayer, IItem) */
export const SCHEMA_MARKER = 'I';

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

export function isSchemaReference(name: string): boolean {
  return name.length > 1 && name[0] === SCHEMA_MARKER && /[A-Z]/.test(name[1]);
}

/**
 * Exact match first, then case-insensitive
 */
export function resolvePrimitive(name: string): PrimitiveName | null {
  const exact = PRIMITIVE_NAMES.find((primitive) => primitive === name);
  if (exact) return exact;
  const lower = name.toLowerCase();
  return PRIMITIVE_NAMES.find((primitive) => primitive.toLowerCase() === lower) ?? null;
}

/**
 * Recursive descent parser for type descriptors
 *
 *   descriptor := base "?"?
 *   base       := primitive | "Array" ("<" descriptor ">")? | "Dictionary" | schema_ref
 */
class DescriptorParser {
  private current = 0;

  constructor(private readonly input: string) {}

  parse(): Descriptor {
    const descriptor = this.descriptor();
    this.skipWhitespace();

    if (!this.isAtEnd()) {
      throw this.error(`Unexpected '${this.peek()}'`);
    }

    return descriptor;
  }

  private descriptor(): Descriptor {
    this.skipWhitespace();
    const start = this.current;
    const type = this.base();

    this.skipWhitespace();
    let nullable = false;
    if (this.peek() === '?') {
      this.current++;
      nullable = true;
    }

    return {
      text: this.input.slice(start, this.current).trim(),
      nullable,
      type,
    };
  }

  private base(): TypeNode {
    const name = this.identifier();

    if (name === 'Array') {
      this.skipWhitespace();
      if (this.peek() !== '<') {
        return { kind: 'array', element: null };
      }
      this.current++;
      const element = this.descriptor();
      this.skipWhitespace();
      if (this.peek() !== '>') {
        throw this.error(this.isAtEnd() ? "Unclosed 'Array<'" : `Expected '>' but found '${this.peek()}'`);
      }
      this.current++;
      return { kind: 'array', element };
    }

    if (name === 'Dictionary') {
      return { kind: 'dictionary' };
    }

    const primitive = resolvePrimitive(name);
    if (primitive) {
      return { kind: 'primitive', name: primitive, written: name };
    }

    if (isSchemaReference(name)) {
      return { kind: 'schema', name };
    }

    throw new DescriptorParseError(`Unknown type '${name}'`, this.input, this.current - name.length);
  }

  private identifier(): string {
    const start = this.current;
    if (this.isAtEnd() || !IDENTIFIER_START.test(this.peek())) {
      throw this.error(this.isAtEnd() ? 'Expected a type name' : `Expected a type name but found '${this.peek()}'`);
    }
    while (!this.isAtEnd() && IDENTIFIER_PART.test(this.peek())) {
      this.current++;
    }
    return this.input.slice(start, this.current);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && /\s/.test(this.peek())) {
      this.current++;
    }
  }

  private peek(): string {
    return this.input.charAt(this.current);
  }

  private isAtEnd(): boolean {
    return this.current >= this.input.length;
  }

  private error(message: string): DescriptorParseError {
    return new DescriptorParseError(message, this.input, this.current);
  }
}

/**
 * Parse a descriptor string such as `Array<IItem>?`.
 * @throws DescriptorParseError when the text does not follow the grammar
 */
export function parseDescriptor(input: string): Descriptor {
  return new DescriptorParser(input).parse();
}
