// Utility functions for JSON Pointer paths and value helpers

/**
 * Format a JSON Pointer path (RFC 6901)
 * @param segments Path segments
 * @returns Formatted JSON Pointer path
 */
export function formatPath(segments: (string | number)[]): string {
  if (segments.length === 0) return '';
  return '/' + segments.map((segment) => encodePointerSegment(String(segment))).join('/');
}

/**
 * Encode a JSON Pointer segment (escape ~ and /)
 */
function encodePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Append a segment to a JSON Pointer path
 */
export function appendPath(path: string, segment: string | number): string {
  return path + '/' + encodePointerSegment(String(segment));
}

/**
 * Check if a value is a plain key/value object (object literal or null-prototype object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}
