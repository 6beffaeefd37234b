/**
 * A set of small integers (0..63) held in one unsigned 64-bit word.
 * Used to mark filtered or changed slot positions without allocating a Set.
 *
 * Callers own the precondition `0 <= index < MAX_SIZE`.
 */

export const MAX_SIZE = 64;

export type LongBitSet = bigint;

export const EMPTY: LongBitSet = BigInt(0);

const ONE = BigInt(1);

function bit(index: number): bigint {
  return ONE << BigInt(index);
}

export function isSet(bits: LongBitSet, index: number): boolean {
  return (bits & bit(index)) !== EMPTY;
}

export function setBit(bits: LongBitSet, index: number): LongBitSet {
  return BigInt.asUintN(MAX_SIZE, bits | bit(index));
}

export function unsetBit(bits: LongBitSet, index: number): LongBitSet {
  return BigInt.asUintN(MAX_SIZE, bits & ~bit(index));
}

/** Population count: how many indices are set. */
export function size(bits: LongBitSet): number {
  let count = 0;
  let remaining = BigInt.asUintN(MAX_SIZE, bits);
  while (remaining !== EMPTY) {
    remaining &= remaining - ONE;
    count++;
  }
  return count;
}
