/**
 * Value equality and hashing shared by the packed map, its entries and baggage fields.
 * null and undefined are the same "no value" and only equal each other.
 */

/** Objects with their own identity semantics (e.g. BaggageField). */
export interface Equatable {
  equals(other: unknown): boolean;
  hashCode(): number;
}

export function isEquatable(value: unknown): value is Equatable {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'equals' in value &&
    typeof value.equals === 'function' &&
    'hashCode' in value &&
    typeof value.hashCode === 'function'
  );
}

export function equal(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a == null || b == null) return a == null && b == null;
  if (isEquatable(a)) return a.equals(b);
  return false;
}

/** 31-multiplier string hash, kept in the signed 32-bit range. */
export function stringHash(value: string): number {
  let h = 0;
  for (let i = 0; i < value.length; i++) {
    h = (Math.imul(31, h) + value.charCodeAt(i)) | 0;
  }
  return h;
}

export function hashCodeOf(value: unknown): number {
  if (value == null) return 0;
  if (isEquatable(value)) return value.hashCode();
  if (typeof value === 'string') return stringHash(value);
  if (typeof value === 'number') return value | 0;
  if (typeof value === 'boolean') return value ? 1231 : 1237;
  return stringHash(String(value));
}

/** Renders null/undefined as the literal `null`, as in the map and entry string forms. */
export function display(value: unknown): string {
  return value == null ? 'null' : String(value);
}
