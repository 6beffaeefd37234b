/**
 * A read-only map which is a view over an array of `key, value` pairs. No key can be null;
 * values can be null, meaning "field present, no value assigned".
 *
 * The array is shared with the caller of {@link UnsafeArrayMap.create}, hence "unsafe": the view
 * never copies or mutates it. This supports cheap views over copy-on-write arrays, where a
 * published array is never written again.
 *
 * The first null key ends the data. Slots at or after it are unreachable through any operation.
 */

import { UnsupportedOperationError } from '../errors';
import {
  EMPTY,
  MAX_SIZE,
  isSet,
  setBit,
  size as bitCount,
  type LongBitSet,
} from '../bitset/long-bitset';
import { display, equal, hashCodeOf } from './equality';

/** Flat `[key0, value0, key1, value1, ...]`. A nullish key terminates the logical length. */
export type PackedArray<K, V> = ReadonlyArray<K | V | null | undefined>;

type Slot<K, V> = K | V | null | undefined;

// Even slots are keys, odd slots are values; callers of create() own that layout.
function isKeySlot<K, V>(slot: Slot<K, V>, index: number): slot is K {
  return index % 2 === 0 && slot != null;
}

function isValueSlot<K, V>(slot: Slot<K, V>, index: number): slot is V {
  return index % 2 === 1 && slot != null;
}

/** Anything shaped like a map entry: a MapEntry, a `{ getKey, getValue }` object or a tuple. */
function entryParts(o: unknown): { key: unknown; value: unknown } | null {
  if (o instanceof MapEntry) return { key: o.key, value: o.value };
  if (Array.isArray(o)) {
    return o.length === 2 ? { key: o[0], value: o[1] } : null;
  }
  if (typeof o !== 'object' || o === null) return null;
  if (
    'getKey' in o &&
    typeof o.getKey === 'function' &&
    'getValue' in o &&
    typeof o.getValue === 'function'
  ) {
    return { key: o.getKey(), value: o.getValue() };
  }
  return null;
}

/** Immutable entry produced by {@link UnsafeArrayMap.entrySet}. */
export class MapEntry<K, V> {
  readonly key: K;
  readonly value: V | null;

  constructor(key: K, value: V | null) {
    if (key == null) throw new TypeError('key == null');
    this.key = key;
    this.value = value;
  }

  getKey(): K {
    return this.key;
  }

  getValue(): V | null {
    return this.value;
  }

  setValue(_value: V | null): never {
    throw new UnsupportedOperationError('Entry.setValue');
  }

  equals(o: unknown): boolean {
    const that = entryParts(o);
    if (that === null) return false;
    return equal(this.key, that.key) && equal(this.value, that.value);
  }

  hashCode(): number {
    let h = 1000003;
    h ^= hashCodeOf(this.key);
    h = Math.imul(h, 1000003);
    h ^= hashCodeOf(this.value);
    return h;
  }

  toString(): string {
    return `Entry{${display(this.key)}=${display(this.value)}}`;
  }
}

/** What a collection view needs from its map: the bounds, the redaction and one projection. */
interface SlotSource<E> {
  readonly toIndex: number;
  readonly size: number;
  isFilteredSlot(index: number): boolean;
  elementAtArrayIndex(index: number): E;
  contains(o: unknown): boolean;
}

/**
 * Iterator over one snapshot of the backing array. Each call to `iterator()` returns a new one;
 * instances are never shared.
 */
export class ReadOnlyIterator<E> implements Iterator<E>, Iterable<E> {
  private index: number;

  constructor(private readonly source: SlotSource<E>) {
    this.index = this.advancePastFiltered(0);
  }

  private advancePastFiltered(i: number): number {
    while (i < this.source.toIndex && this.source.isFilteredSlot(i)) i += 2;
    return i;
  }

  hasNext(): boolean {
    this.index = this.advancePastFiltered(this.index);
    return this.index < this.source.toIndex;
  }

  next(): IteratorResult<E> {
    if (!this.hasNext()) return { done: true, value: undefined };
    const value = this.source.elementAtArrayIndex(this.index);
    this.index += 2;
    return { done: false, value };
  }

  remove(): never {
    throw new UnsupportedOperationError('Iterator.remove');
  }

  [Symbol.iterator](): Iterator<E> {
    return this;
  }
}

/** Read-only keys, values or entries of an {@link UnsafeArrayMap}. */
export class CollectionView<E> implements Iterable<E> {
  constructor(private readonly source: SlotSource<E>) {}

  get size(): number {
    return this.source.size;
  }

  isEmpty(): boolean {
    return this.source.size === 0;
  }

  contains(o: unknown): boolean {
    return this.source.contains(o);
  }

  containsAll(c: Iterable<unknown> | null | undefined): boolean {
    if (c == null) return false;
    for (const element of c) {
      if (!this.contains(element)) return false;
    }
    return true;
  }

  iterator(): ReadOnlyIterator<E> {
    return new ReadOnlyIterator(this.source);
  }

  [Symbol.iterator](): Iterator<E> {
    return this.iterator();
  }

  /**
   * Copies the elements in scan order. A destination at least `size` long is filled from index 0
   * and returned as is, leaving its trailing slots untouched; otherwise a new array is returned.
   */
  toArray(): E[];
  toArray<T>(dest: Array<E | T>): Array<E | T>;
  toArray<T>(dest?: Array<E | T>): Array<E | T> {
    const result = dest !== undefined && dest.length >= this.size ? dest : new Array<E | T>(this.size);
    let d = 0;
    for (let i = 0; i < this.source.toIndex; i += 2) {
      if (this.source.isFilteredSlot(i)) continue;
      result[d++] = this.source.elementAtArrayIndex(i);
    }
    return result;
  }

  add(_element: E): never {
    throw new UnsupportedOperationError('add');
  }

  addAll(_elements: Iterable<E>): never {
    throw new UnsupportedOperationError('addAll');
  }

  remove(_element: unknown): never {
    throw new UnsupportedOperationError('remove');
  }

  removeAll(_elements: Iterable<unknown>): never {
    throw new UnsupportedOperationError('removeAll');
  }

  retainAll(_elements: Iterable<unknown>): never {
    throw new UnsupportedOperationError('retainAll');
  }

  clear(): never {
    throw new UnsupportedOperationError('clear');
  }
}

export class UnsafeArrayMap<K, V> implements Iterable<MapEntry<K, V>> {
  static readonly MAX_FILTERED_KEYS = MAX_SIZE;

  static readonly EMPTY_MAP: UnsafeArrayMap<never, never> = new UnsafeArrayMap<never, never>(
    [],
    0,
    EMPTY
  );

  static create<K, V>(array: PackedArray<K, V>): UnsafeArrayMap<K, V> {
    if (array == null) throw new TypeError('array == null');
    let i = 0;
    for (; i < array.length; i += 2) {
      if (array[i] == null) break; // we ignore anything starting at first null key
    }
    if (i === 0) return UnsafeArrayMap.EMPTY_MAP;
    return new UnsafeArrayMap<K, V>(array, i, EMPTY);
  }

  /** Resets redaction: a view over `array` with `filteredKeys` hidden. */
  static filterKeys<K, V>(array: PackedArray<K, V>, ...filteredKeys: K[]): UnsafeArrayMap<K, V> {
    return UnsafeArrayMap.create(array).filterKeys(...filteredKeys);
  }

  readonly size: number;

  private constructor(
    private readonly array: PackedArray<K, V>,
    private readonly toIndex: number,
    private readonly filteredKeys: LongBitSet
  ) {
    this.size = toIndex / 2 - bitCount(filteredKeys);
  }

  /**
   * Returns a view that additionally hides every slot whose key equals one of `keys`.
   * Returns this view when nothing new matches, and {@link EMPTY_MAP} when nothing is left.
   *
   * @throws RangeError for more than 64 keys, or a match beyond the 64th pair
   */
  filterKeys(...keys: K[]): UnsafeArrayMap<K, V> {
    if (keys.length > UnsafeArrayMap.MAX_FILTERED_KEYS) {
      throw new RangeError(`cannot redact more than ${UnsafeArrayMap.MAX_FILTERED_KEYS} keys`);
    }
    if (keys.length === 0 || this.size === 0) return this;

    let filtered = this.filteredKeys;
    for (let i = 0; i < this.toIndex; i += 2) {
      if (this.isFilteredSlot(i)) continue;
      const key = this.array[i];
      if (!keys.some((k) => equal(k, key))) continue;
      if (i / 2 >= UnsafeArrayMap.MAX_FILTERED_KEYS) {
        throw new RangeError(
          `cannot redact key at pair index ${i / 2}: only the first ${UnsafeArrayMap.MAX_FILTERED_KEYS} pairs can be filtered`
        );
      }
      filtered = setBit(filtered, i / 2);
    }
    if (filtered === this.filteredKeys) return this;
    if (bitCount(filtered) === this.toIndex / 2) return UnsafeArrayMap.EMPTY_MAP;
    return new UnsafeArrayMap<K, V>(this.array, this.toIndex, filtered);
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  containsKey(o: unknown): boolean {
    if (o == null) return false; // null keys are not allowed
    return this.arrayIndexOfKey(o) !== -1;
  }

  has(o: unknown): boolean {
    return this.containsKey(o);
  }

  containsValue(o: unknown): boolean {
    for (let i = 0; i < this.toIndex; i += 2) {
      if (!this.isFilteredSlot(i) && equal(o, this.array[i + 1])) return true;
    }
    return false;
  }

  /** Returns the value for `o`, or null when absent, filtered or assigned no value. */
  get(o: unknown): V | null {
    if (o == null) return null; // null keys are not allowed
    const i = this.arrayIndexOfKey(o);
    return i !== -1 ? this.valueAt(i) : null;
  }

  keySet(): CollectionView<K> {
    return new CollectionView<K>({
      toIndex: this.toIndex,
      size: this.size,
      isFilteredSlot: (i) => this.isFilteredSlot(i),
      elementAtArrayIndex: (i) => this.keyAt(i),
      contains: (o) => this.containsKey(o),
    });
  }

  values(): CollectionView<V | null> {
    return new CollectionView<V | null>({
      toIndex: this.toIndex,
      size: this.size,
      isFilteredSlot: (i) => this.isFilteredSlot(i),
      elementAtArrayIndex: (i) => this.valueAt(i),
      contains: (o) => this.containsValue(o),
    });
  }

  entrySet(): CollectionView<MapEntry<K, V>> {
    return new CollectionView<MapEntry<K, V>>({
      toIndex: this.toIndex,
      size: this.size,
      isFilteredSlot: (i) => this.isFilteredSlot(i),
      elementAtArrayIndex: (i) => new MapEntry<K, V>(this.keyAt(i), this.valueAt(i)),
      contains: (o) => {
        const that = entryParts(o);
        if (that === null || that.key == null) return false;
        const i = this.arrayIndexOfKey(that.key);
        return i !== -1 && equal(that.value, this.array[i + 1]);
      },
    });
  }

  forEach(callback: (value: V | null, key: K) => void): void {
    for (let i = 0; i < this.toIndex; i += 2) {
      if (this.isFilteredSlot(i)) continue;
      callback(this.valueAt(i), this.keyAt(i));
    }
  }

  [Symbol.iterator](): Iterator<MapEntry<K, V>> {
    return this.entrySet().iterator();
  }

  set(_key: K, _value: V | null): never {
    throw new UnsupportedOperationError('put');
  }

  putAll(_entries: Iterable<unknown>): never {
    throw new UnsupportedOperationError('putAll');
  }

  delete(_key: unknown): never {
    throw new UnsupportedOperationError('remove');
  }

  clear(): never {
    throw new UnsupportedOperationError('clear');
  }

  toString(): string {
    const parts: string[] = [];
    for (let i = 0; i < this.toIndex; i += 2) {
      if (this.isFilteredSlot(i)) continue;
      parts.push(`${display(this.array[i])}=${display(this.array[i + 1])}`);
    }
    return `UnsafeArrayMap{${parts.join(',')}}`;
  }

  private arrayIndexOfKey(o: unknown): number {
    for (let i = 0; i < this.toIndex; i += 2) {
      if (!this.isFilteredSlot(i) && equal(o, this.array[i])) return i;
    }
    return -1;
  }

  private keyAt(i: number): K {
    const slot = this.array[i];
    if (!isKeySlot<K, V>(slot, i)) throw new TypeError(`no key at array index ${i}`);
    return slot;
  }

  private valueAt(keyIndex: number): V | null {
    const slot = this.array[keyIndex + 1];
    return isValueSlot<K, V>(slot, keyIndex + 1) ? slot : null;
  }

  private isFilteredSlot(i: number): boolean {
    return isSet(this.filteredKeys, i / 2);
  }
}
