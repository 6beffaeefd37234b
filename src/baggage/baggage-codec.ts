/**
 * Reads and writes baggage fields to and from a propagation header.
 */

import type { UnsafeArrayMap } from '../core/map/unsafe-array-map';
import type { TraceContext } from '../core/trace-context';
import type { BaggageField } from './baggage-field';
import type { BaggageState } from './baggage-state';

export interface BaggageCodec {
  /** Header names read on extract, in order of preference. */
  extractKeyNames(): readonly string[];
  /** Header names written on inject. */
  injectKeyNames(): readonly string[];
  /** @returns true when any field of `state` changed */
  decode(state: BaggageState, value: string): boolean;
  /** @returns null when there is nothing to write */
  encode(values: UnsafeArrayMap<BaggageField, string>, context: TraceContext): string | null;
}
