/**
 * Holds the baggage fields of one trace context in its extra list.
 *
 * The state is a flat `[field0, value0, field1, value1, ...]` array published through a single
 * compare-and-swap. A published array is never written again, so readers (including map views
 * handed to codecs) can keep using it without coordination. Fields are append-only: the slot of
 * a field never moves, which makes a lost race safe to retry from a fresh read.
 */

import { diag } from '@opentelemetry/api';
import { Extra } from '../core/extra/extra';
import { equal, hashCodeOf, display } from '../core/map/equality';
import { UnsafeArrayMap } from '../core/map/unsafe-array-map';
import { EMPTY, isSet, setBit, type LongBitSet } from '../core/bitset/long-bitset';
import { BaggageField } from './baggage-field';
import type { BaggageStateFactory } from './baggage-state-factory';

/** Copy-on-write state. Even slots are fields, odd slots their values (null: no value). */
export type BaggageArray = ReadonlyArray<BaggageField | string | null>;

type UpdateOutcome = 'changed' | 'conflict' | 'rejected';

export class BaggageState extends Extra<BaggageState, BaggageStateFactory, BaggageArray> {
  constructor(factory: BaggageStateFactory) {
    super(factory);
  }

  array(): BaggageArray {
    return this.state();
  }

  /** When true, {@link getAllFields} cannot be cached. */
  isDynamic(): boolean {
    return this.factory.isDynamic;
  }

  /** The fields present, regardless of value. */
  getAllFields(): readonly BaggageField[] {
    if (!this.factory.isDynamic) return this.factory.initialFieldList;
    const array = this.array();
    const result: BaggageField[] = [];
    for (let i = 0; i < array.length; i += 2) {
      const field = array[i];
      if (field instanceof BaggageField) result.push(field);
    }
    return Object.freeze(result);
  }

  /** A read-only view of the current values, without the given fields. */
  toMapFilteringFields(...filtered: BaggageField[]): UnsafeArrayMap<BaggageField, string> {
    return UnsafeArrayMap.create<BaggageField, string>(this.array()).filterKeys(...filtered);
  }

  /** Value of the field, or null when not present or assigned no value. */
  getValue(field: BaggageField | null | undefined): string | null {
    if (field == null) return null;
    const state = this.array();
    const i = this.indexOfField(state, field);
    return i !== -1 ? valueAt(state, i) : null;
  }

  /**
   * Updates the state to include a value change.
   *
   * @param value null clears the value but keeps the field present
   * @returns true when the underlying state changed
   */
  updateValue(field: BaggageField | null | undefined, value: string | null): boolean {
    if (field == null) return false;
    let updateAttempts = this.factory.updateAttempts;
    while (updateAttempts > 0) {
      const state = this.array();
      const i = this.indexOfField(state, field);
      let outcome: UpdateOutcome;
      if (i !== -1) {
        if (equal(value, state[i + 1])) return false;
        // same field, different value
        outcome = this.tryUpdateValue(state, i, value);
      } else {
        // a new field, but the policy may not allow growth
        if (!this.isDynamic()) return false;
        outcome = this.tryAddNewField(state, field, value);
      }
      if (outcome === 'changed') return true;
      if (outcome === 'rejected') return false;
      updateAttempts--;
    }

    diag.warn(`Failed to update ${field.name}`);
    return false;
  }

  /**
   * For each of their fields: absent in ours is appended, null in ours takes their value, and a
   * non-null value in ours always wins. Returns our array itself when nothing changes.
   */
  mergeStateKeepingOursOnConflict(theirs: BaggageState): BaggageArray {
    const ourArray = this.array();
    const theirArray = theirs.array();

    // scan first to see if we need to change our values, grow our array, or neither
    let changeInOurs: LongBitSet = EMPTY;
    let newToOurs: LongBitSet = EMPTY;
    let newCount = 0;
    const room = this.factory.maxDynamicFields - ourArray.length / 2;
    let dropped = false;
    for (let i = 0; i < theirArray.length; i += 2) {
      const theirField = theirArray[i];
      if (!(theirField instanceof BaggageField)) break; // end of keys
      const ourIndex = this.indexOfField(ourArray, theirField);
      const bitsetIndex = i / 2;
      if (ourIndex === -1) {
        if (newCount < room) {
          newToOurs = setBit(newToOurs, bitsetIndex);
          newCount++;
        } else {
          dropped = true;
        }
      } else {
        const ourValue = ourArray[ourIndex + 1];
        if (ourValue != null) continue; // ours wins
        if (!equal(ourValue, theirArray[i + 1])) {
          changeInOurs = setBit(changeInOurs, bitsetIndex);
        }
      }
    }

    if (dropped) {
      diag.warn(`Ignoring request to add > ${this.factory.maxDynamicFields} dynamic fields`);
    }
    if (changeInOurs === EMPTY && newToOurs === EMPTY) return ourArray;

    // copy-on-write: one new array large enough for every change
    const newState: Array<BaggageField | string | null> = [...ourArray];
    for (let i = 0; i < theirArray.length; i += 2) {
      const theirField = theirArray[i];
      if (!(theirField instanceof BaggageField)) break;
      const bitsetIndex = i / 2;
      if (isSet(changeInOurs, bitsetIndex)) {
        const ourIndex = this.indexOfField(newState, theirField);
        newState[ourIndex + 1] = valueAt(theirArray, i);
      } else if (isSet(newToOurs, bitsetIndex)) {
        newState.push(theirField, valueAt(theirArray, i));
      }
    }
    return Object.freeze(newState);
  }

  /** Array index of the field's key slot, or -1. Static fields resolve without a scan. */
  indexOfField(state: BaggageArray, field: BaggageField): number {
    const index = this.factory.initialFieldIndices.get(field.lcName);
    if (index !== undefined) return index;
    for (let i = this.factory.initialArrayLength; i < state.length; i += 2) {
      const key = state[i];
      if (key == null) break; // end of keys
      if (field.equals(key)) return i;
    }
    return -1;
  }

  private tryUpdateValue(state: BaggageArray, i: number, value: string | null): UpdateOutcome {
    const newState = [...state]; // copy-on-write
    newState[i + 1] = value;
    return this.factory.compareAndSetState(this, state, Object.freeze(newState))
      ? 'changed'
      : 'conflict';
  }

  /** Grows the array to append a new field/value pair. */
  private tryAddNewField(
    state: BaggageArray,
    field: BaggageField,
    value: string | null
  ): UpdateOutcome {
    if ((state.length + 2) / 2 > this.factory.maxDynamicFields) {
      diag.warn(`Ignoring request to add > ${this.factory.maxDynamicFields} dynamic fields`);
      return 'rejected';
    }
    const newState = [...state, field, value]; // copy-on-write
    return this.factory.compareAndSetState(this, state, Object.freeze(newState))
      ? 'changed'
      : 'conflict';
  }

  protected stateEquals(thatState: unknown): boolean {
    const ours = this.array();
    if (!Array.isArray(thatState) || thatState.length !== ours.length) return false;
    return ours.every((slot, i) => equal(slot, thatState[i]));
  }

  protected stateHashCode(): number {
    let h = 1;
    for (const slot of this.array()) h = (Math.imul(31, h) + hashCodeOf(slot)) | 0;
    return h;
  }

  protected stateString(): string {
    return `[${this.array().map(display).join(', ')}]`;
  }
}

function valueAt(state: BaggageArray, keyIndex: number): string | null {
  const value = state[keyIndex + 1];
  return typeof value === 'string' ? value : null;
}
