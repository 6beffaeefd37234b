/**
 * Codec for the W3C `baggage` header: `key1=value1,key2=value2`.
 * Member properties (`;prop=x`) are dropped on decode; values are carried verbatim.
 */

import type { UnsafeArrayMap } from '../core/map/unsafe-array-map';
import type { TraceContext } from '../core/trace-context';
import type { BaggageCodec } from './baggage-codec';
import { BaggageField } from './baggage-field';
import type { BaggageState } from './baggage-state';

export const BAGGAGE_HEADER = 'baggage';

export class SingleHeaderCodec implements BaggageCodec {
  static readonly INSTANCE = new SingleHeaderCodec();

  private readonly keyNames: readonly string[] = Object.freeze([BAGGAGE_HEADER]);

  extractKeyNames(): readonly string[] {
    return this.keyNames;
  }

  injectKeyNames(): readonly string[] {
    return this.keyNames;
  }

  /** Fields outside a static field set are dropped unless the state is dynamic. */
  decode(state: BaggageState, value: string): boolean {
    let decoded = false;
    for (const member of value.split(',')) {
      const pair = member.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      const name = pair.substring(0, eq).trim();
      if (name === '') continue;
      if (state.updateValue(BaggageField.create(name), pair.substring(eq + 1).trim())) {
        decoded = true;
      }
    }
    return decoded;
  }

  encode(values: UnsafeArrayMap<BaggageField, string>, _context: TraceContext): string | null {
    const members: string[] = [];
    values.forEach((value, field) => {
      if (value !== null) members.push(`${field.name}=${value}`);
    });
    return members.length === 0 ? null : members.join(',');
  }
}
