/**
 * Tests for core/map/unsafe-array-map: read-only map view over packed key/value pairs.
 * Sizes, lookups, redaction, collection views, toArray buffers and read-only enforcement.
 */

import { UnsupportedOperationError } from '../core/errors';
import { CollectionView, MapEntry, UnsafeArrayMap } from '../core/map/unsafe-array-map';

function newArray(): Array<string | null> {
  return new Array<string | null>(6).fill(null);
}

function entryStrings(map: UnsafeArrayMap<string, string>): string[] {
  return map.entrySet().toArray().map((e) => e.toString());
}

function assertSize(map: UnsafeArrayMap<string, string>, size: number): void {
  expect(map.size).toBe(size);
  expect(map.keySet().size).toBe(size);
  expect(map.values().size).toBe(size);
  expect(map.entrySet().size).toBe(size);
  const isEmpty = size === 0;
  expect(map.isEmpty()).toBe(isEmpty);
  expect(map.keySet().isEmpty()).toBe(isEmpty);
  expect(map.values().isEmpty()).toBe(isEmpty);
  expect(map.entrySet().isEmpty()).toBe(isEmpty);
  expect(map.keySet().iterator().hasNext()).toBe(!isEmpty);
  expect(map.values().iterator().hasNext()).toBe(!isEmpty);
  expect(map.entrySet().iterator().hasNext()).toBe(!isEmpty);
}

function assertBaseCase(map: UnsafeArrayMap<string, string>): void {
  expect(map.containsKey(null)).toBe(false);
  expect(map.containsKey(undefined)).toBe(false);
  expect(map.containsKey('4')).toBe(false);
  expect(map.has('4')).toBe(false);
  expect(map.entrySet().contains([null, null])).toBe(false);
  expect(map.entrySet().contains(['4', null])).toBe(false);
  expect(map.keySet().contains(null)).toBe(false);

  for (const key of map.keySet()) {
    expect(key).not.toBeNull();
    expect(map.containsKey(key)).toBe(true);
    const value = map.get(key);
    expect(map.values().contains(value)).toBe(true);
    expect(map.entrySet().contains(new MapEntry(key, value))).toBe(true);
  }

  expect(map.get(null)).toBeNull();
  expect(map.get('4')).toBeNull();

  for (const collection of [map.keySet(), map.values(), map.entrySet()]) {
    expect(collection.containsAll([])).toBe(true);
    expect(collection.containsAll(collection)).toBe(true);
    expect(collection.containsAll(null)).toBe(false);
    expect(collection.contains('4')).toBe(false);
    expect(collection.containsAll(['4'])).toBe(false);
  }
}

describe('UnsafeArrayMap', () => {
  let array: Array<string | null>;

  beforeEach(() => {
    array = newArray();
  });

  it('coerces an array with no keys to the shared empty map', () => {
    const map = UnsafeArrayMap.create<string, string>(array);
    expect(map).toBe(UnsafeArrayMap.EMPTY_MAP);
    assertSize(map, 0);
    assertBaseCase(map);
    expect(map.toString()).toBe('UnsafeArrayMap{}');
  });

  it('coerces an empty array to the shared empty map', () => {
    expect(UnsafeArrayMap.create<string, string>([])).toBe(UnsafeArrayMap.EMPTY_MAP);
  });

  it('rejects a missing array', () => {
    const missing: Array<string | null> | null = null;
    expect(() => UnsafeArrayMap.create<string, string>(missing as unknown as string[])).toThrow(
      TypeError
    );
  });

  it('reads pairs with no null values', () => {
    array.splice(0, 6, '1', 'one', '2', 'two', '3', 'three');

    const map = UnsafeArrayMap.create<string, string>(array);
    assertSize(map, 3);
    assertBaseCase(map);

    expect(entryStrings(map)).toEqual(['Entry{1=one}', 'Entry{2=two}', 'Entry{3=three}']);
    expect(map.toString()).toBe('UnsafeArrayMap{1=one,2=two,3=three}');
    expect(map.get('1')).toBe('one');
    expect(map.get('2')).toBe('two');
    expect(map.get('3')).toBe('three');
  });

  it('reads values equal to their keys', () => {
    array.splice(0, 6, '1', '1', '2', '2', '3', '3');

    const map = UnsafeArrayMap.create<string, string>(array);
    assertSize(map, 3);
    assertBaseCase(map);

    expect(map.toString()).toBe('UnsafeArrayMap{1=1,2=2,3=3}');
    expect(map.get('2')).toBe('2');
  });

  it('reads pairs where some values are null', () => {
    array.splice(0, 5, '1', 'one', '2', 'two', '3');

    const map = UnsafeArrayMap.create<string, string>(array);
    assertSize(map, 3);
    assertBaseCase(map);

    expect(entryStrings(map)).toEqual(['Entry{1=one}', 'Entry{2=two}', 'Entry{3=null}']);
    expect(map.toString()).toBe('UnsafeArrayMap{1=one,2=two,3=null}');
    expect(map.get('3')).toBeNull();
    expect(map.containsKey('3')).toBe(true);
    expect(map.containsValue(null)).toBe(true);
  });

  it('reads pairs where every value is null', () => {
    array[0] = '1';
    array[2] = '2';
    array[4] = '3';

    const map = UnsafeArrayMap.create<string, string>(array);
    assertSize(map, 3);
    assertBaseCase(map);

    expect(map.toString()).toBe('UnsafeArrayMap{1=null,2=null,3=null}');
    expect(map.get('1')).toBeNull();
    expect(map.containsValue('one')).toBe(false);
  });

  it('treats array holes like null', () => {
    const holes = new Array<string>(4);
    holes[0] = 'a';
    const map = UnsafeArrayMap.create<string, string>(holes);
    assertSize(map, 1);
    expect(map.toString()).toBe('UnsafeArrayMap{a=null}');
  });

  it('ignores everything starting at the first null key', () => {
    const packed = ['a', '1', null, '2', 'b', '3'];
    const map = UnsafeArrayMap.create<string, string>(packed);

    assertSize(map, 1);
    expect(map.containsKey('b')).toBe(false);
    expect(map.get('b')).toBeNull();
    expect(map.containsValue('3')).toBe(false);
    expect(map.keySet().toArray()).toEqual(['a']);
    expect(map.toString()).toBe('UnsafeArrayMap{a=1}');
  });

  it('never mutates the array it views', () => {
    array.splice(0, 6, '1', 'one', '2', 'two', '3', 'three');
    const before = [...array];
    UnsafeArrayMap.create<string, string>(array).filterKeys('2').toString();
    expect(array).toEqual(before);
  });

  describe('filterKeys', () => {
    beforeEach(() => {
      array.splice(0, 6, '1', 'one', '2', 'two', '3', 'three');
    });

    it('returns the shared empty map when every key is filtered', () => {
      const map = UnsafeArrayMap.create<string, string>(array).filterKeys('1', '2', '3');
      expect(map).toBe(UnsafeArrayMap.EMPTY_MAP);
    });

    it('hides filtered keys from every operation', () => {
      const map = UnsafeArrayMap.create<string, string>(array).filterKeys('1', '3');
      assertSize(map, 1);
      assertBaseCase(map);

      expect(entryStrings(map)).toEqual(['Entry{2=two}']);
      expect(map.toString()).toBe('UnsafeArrayMap{2=two}');
      expect(map.get('1')).toBeNull();
      expect(map.get('2')).toBe('two');
      expect(map.get('3')).toBeNull();
      expect(map.containsKey('1')).toBe(false);
      expect(map.containsValue('one')).toBe(false);
      expect(map.keySet().toArray()).toEqual(['2']);
      expect(map.values().toArray()).toEqual(['two']);
    });

    it('returns the same view when filtering nothing', () => {
      const map = UnsafeArrayMap.create<string, string>(array);
      expect(map.filterKeys()).toBe(map);
    });

    it('returns the same view when no key matches', () => {
      const map = UnsafeArrayMap.create<string, string>(array);
      expect(map.filterKeys('4', '5')).toBe(map);
    });

    it('is idempotent', () => {
      const filtered = UnsafeArrayMap.create<string, string>(array).filterKeys('1');
      expect(filtered.filterKeys('1')).toBe(filtered);
    });

    it('adds to an existing redaction', () => {
      const map = UnsafeArrayMap.create<string, string>(array).filterKeys('1').filterKeys('2');
      expect(map.toString()).toBe('UnsafeArrayMap{3=three}');
      expect(map.size).toBe(1);
    });

    it('static form resets redaction over the array', () => {
      const map = UnsafeArrayMap.filterKeys<string, string>(array, '2');
      expect(map.toString()).toBe('UnsafeArrayMap{1=one,3=three}');
    });

    it('rejects more keys than the bitset holds', () => {
      const keys = Array.from({ length: 65 }, (_, i) => String(i));
      const map = UnsafeArrayMap.create<string, string>(array);
      expect(() => map.filterKeys(...keys)).toThrow(RangeError);
      expect(() => map.filterKeys(...keys)).toThrow('cannot redact more than 64 keys');
      expect(() => UnsafeArrayMap.create<string, string>([]).filterKeys(...keys)).toThrow(RangeError);
    });

    it('rejects a matching key past the 64th pair instead of leaving it visible', () => {
      const wide: string[] = [];
      for (let i = 0; i < 70; i++) wide.push(`k${i}`, `v${i}`);
      const map = UnsafeArrayMap.create<string, string>(wide);

      expect(map.size).toBe(70);
      expect(() => map.filterKeys('k65')).toThrow(RangeError);
      expect(() => map.filterKeys('k65')).toThrow(
        'cannot redact key at pair index 65: only the first 64 pairs can be filtered'
      );
      const filtered = map.filterKeys('k63');
      expect(filtered.size).toBe(69);
      expect(filtered.containsKey('k63')).toBe(false);
      expect(filtered.get('k65')).toBe('v65');
    });

    it('accepts exactly 64 keys', () => {
      const keys = Array.from({ length: 64 }, (_, i) => String(i + 10));
      const map = UnsafeArrayMap.create<string, string>(array);
      expect(map.filterKeys(...keys)).toBe(map);
    });
  });

  describe('toArray', () => {
    beforeEach(() => {
      array.splice(0, 5, '1', 'one', '2', 'two', '3');
    });

    function testToArray<E>(view: CollectionView<E>, expected: unknown[]): void {
      const fresh = view.toArray();
      expect(fresh).not.toBe(array);
      expect(fresh).toEqual(expected);

      const tooShort: unknown[] = [];
      const grown = view.toArray(tooShort);
      expect(grown).not.toBe(tooShort);
      expect(grown).not.toBe(array);
      expect(grown).toEqual(expected);

      const justRight = new Array<unknown>(3);
      expect(view.toArray(justRight)).toBe(justRight);
      expect(justRight).toEqual(expected);

      const tooLong = new Array<unknown>(5).fill('x');
      expect(view.toArray(tooLong)).toBe(tooLong);
      expect(tooLong).toEqual([...expected, 'x', 'x']);
    }

    it('copies keys', () => {
      testToArray(UnsafeArrayMap.create<string, string>(array).keySet(), ['1', '2', '3']);
    });

    it('copies values', () => {
      testToArray(UnsafeArrayMap.create<string, string>(array).values(), ['one', 'two', null]);
    });

    it('copies entries', () => {
      testToArray(UnsafeArrayMap.create<string, string>(array).entrySet(), [
        new MapEntry('1', 'one'),
        new MapEntry('2', 'two'),
        new MapEntry('3', null),
      ]);
    });
  });

  describe('iteration', () => {
    beforeEach(() => {
      array.splice(0, 6, '1', 'one', '2', 'two', '3', 'three');
    });

    it('returns a new iterator per call', () => {
      const keys = UnsafeArrayMap.create<string, string>(array).keySet();
      const first = keys.iterator();
      expect(first.next()).toEqual({ done: false, value: '1' });
      const second = keys.iterator();
      expect(second.next()).toEqual({ done: false, value: '1' });
      expect(first.next()).toEqual({ done: false, value: '2' });
    });

    it('finishes after the last unfiltered slot', () => {
      const it = UnsafeArrayMap.create<string, string>(array).filterKeys('3').values().iterator();
      expect(it.next().value).toBe('one');
      expect(it.next().value).toBe('two');
      expect(it.hasNext()).toBe(false);
      expect(it.next().done).toBe(true);
    });

    it('iterates the map as entries with for..of', () => {
      const map = UnsafeArrayMap.create<string, string>(array).filterKeys('2');
      const seen: string[] = [];
      for (const entry of map) seen.push(`${entry.key}:${entry.value}`);
      expect(seen).toEqual(['1:one', '3:three']);
    });

    it('forEach visits unfiltered pairs in scan order', () => {
      const map = UnsafeArrayMap.create<string, string>(array).filterKeys('1');
      const seen: Array<[string, string | null]> = [];
      map.forEach((value, key) => seen.push([key, value]));
      expect(seen).toEqual([
        ['2', 'two'],
        ['3', 'three'],
      ]);
    });

    it('keeps reading the array it closed over', () => {
      const snapshot = ['1', 'one'];
      const map = UnsafeArrayMap.create<string, string>(snapshot);
      const keys = map.keySet().iterator();
      // copy-on-write publishes a new array; the view and its iterators keep the old one
      const published = [...snapshot, '2', 'two'];
      expect(UnsafeArrayMap.create<string, string>(published).size).toBe(2);
      expect(map.toString()).toBe('UnsafeArrayMap{1=one}');
      expect(keys.next().value).toBe('1');
      expect(keys.hasNext()).toBe(false);
    });
  });

  it('rejects every mutation', () => {
    array[0] = '1';
    array[1] = '1';
    const map = UnsafeArrayMap.create<string, string>(array);

    expect(() => map.set('1', '1')).toThrow(UnsupportedOperationError);
    expect(() => map.putAll(map)).toThrow(UnsupportedOperationError);
    expect(() => map.delete('1')).toThrow(UnsupportedOperationError);
    expect(() => map.clear()).toThrow(UnsupportedOperationError);

    const set = map.keySet();
    expect(() => set.add('2')).toThrow(UnsupportedOperationError);
    expect(() => set.addAll(set)).toThrow(UnsupportedOperationError);
    expect(() => set.retainAll(set)).toThrow(UnsupportedOperationError);
    expect(() => set.remove('1')).toThrow(UnsupportedOperationError);
    expect(() => set.removeAll(set)).toThrow(UnsupportedOperationError);
    expect(() => set.clear()).toThrow(UnsupportedOperationError);

    expect(() => set.iterator().remove()).toThrow(UnsupportedOperationError);
    const [entry] = map.entrySet().toArray();
    expect(() => entry.setValue('1')).toThrow(UnsupportedOperationError);
    expect(array).toEqual(['1', '1', null, null, null, null]);
  });

  describe('MapEntry', () => {
    const entry = new MapEntry('1', 'one');

    it('equals itself and an entry with the same state', () => {
      expect(entry.equals(entry)).toBe(true);
      const sameState = new MapEntry('1', 'one');
      expect(entry.equals(sameState)).toBe(true);
      expect(entry.hashCode()).toBe(sameState.hashCode());
      expect(entry.toString()).toBe('Entry{1=one}');
    });

    it('equals other entry shapes with the same key and value', () => {
      expect(entry.equals(['1', 'one'])).toBe(true);
      expect(entry.equals({ getKey: () => '1', getValue: () => 'one' })).toBe(true);
      expect(entry.equals('1=one')).toBe(false);
      expect(entry.equals(null)).toBe(false);
    });

    it('differs from an entry with a different key', () => {
      const differentKey = new MapEntry('2', 'one');
      expect(entry.equals(differentKey)).toBe(false);
      expect(differentKey.equals(entry)).toBe(false);
      expect(entry.hashCode()).not.toBe(differentKey.hashCode());
    });

    it('differs from an entry with a different value', () => {
      const differentValue = new MapEntry('1', '2');
      expect(entry.equals(differentValue)).toBe(false);
      expect(differentValue.equals(entry)).toBe(false);
      expect(entry.hashCode()).not.toBe(differentValue.hashCode());
    });

    it('differs from an entry with a null value', () => {
      const nullValue = new MapEntry<string, string>('1', null);
      expect(entry.equals(nullValue)).toBe(false);
      expect(nullValue.equals(entry)).toBe(false);
      expect(entry.hashCode()).not.toBe(nullValue.hashCode());
      expect(nullValue.toString()).toBe('Entry{1=null}');
    });

    it('rejects a null key', () => {
      const missing: string | null = null;
      expect(() => new MapEntry(missing as unknown as string, 'one')).toThrow('key == null');
    });
  });
});
