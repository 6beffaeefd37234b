/**
 * A named piece of contextual data propagated alongside a trace.
 *
 * Identity is the lowercase name: `BaggageField.create('User-Id')` equals
 * `BaggageField.create('user-id')`. `name` keeps the case it was created with, for encoding.
 */

import type { Equatable } from '../core/map/equality';
import { stringHash } from '../core/map/equality';
import type { TraceContext } from '../core/trace-context';
import { BaggageState } from './baggage-state';
import type { BaggageStateFactory } from './baggage-state-factory';

/**
 * The state `factory` attached to the context, or, without a factory, the first baggage state
 * of any factory. Pass the factory when several factories decorate the same contexts.
 */
function findState(context: TraceContext, factory?: BaggageStateFactory): BaggageState | null {
  if (factory === undefined) return context.findExtra(BaggageState);
  for (const next of context.extra) {
    if (next instanceof BaggageState && next.factory === factory) return next;
  }
  return null;
}

export class BaggageField implements Equatable {
  readonly name: string;
  /** Lowercase name; the key of this field's identity. */
  readonly lcName: string;

  private constructor(name: string) {
    this.name = name;
    this.lcName = name.toLowerCase();
  }

  /** @throws TypeError when the name is missing or blank */
  static create(name: string): BaggageField {
    if (name == null) throw new TypeError('name == null');
    const trimmed = String(name).trim();
    if (trimmed === '') throw new TypeError('name is empty');
    return new BaggageField(trimmed);
  }

  /**
   * Value of this field in the context's baggage, or null when unset or not carried.
   * Without `factory` only the first baggage state on the context is consulted.
   */
  getValue(context: TraceContext | null | undefined, factory?: BaggageStateFactory): string | null {
    if (context == null) return null;
    const state = findState(context, factory);
    return state !== null ? state.getValue(this) : null;
  }

  /** @returns true when the context's baggage changed */
  updateValue(
    context: TraceContext | null | undefined,
    value: string | null,
    factory?: BaggageStateFactory
  ): boolean {
    if (context == null) return false;
    const state = findState(context, factory);
    return state !== null ? state.updateValue(this, value) : false;
  }

  /** Non-null values of every field carried by the context, keyed by field name. */
  static getAllValues(
    context: TraceContext | null | undefined,
    factory?: BaggageStateFactory
  ): Record<string, string> {
    const result: Record<string, string> = {};
    if (context == null) return result;
    const state = findState(context, factory);
    if (state === null) return result;
    state.toMapFilteringFields().forEach((value, field) => {
      if (value !== null) result[field.name] = value;
    });
    return result;
  }

  equals(o: unknown): boolean {
    if (o === this) return true;
    return o instanceof BaggageField && o.lcName === this.lcName;
  }

  hashCode(): number {
    return stringHash(this.lcName);
  }

  toString(): string {
    return `BaggageField{${this.name}}`;
  }
}
