/**
 * TextMapPropagator that carries a {@link BaggageStateFactory}'s fields in a header.
 * Register it alongside the W3C trace-context propagator, e.g. in a CompositePropagator.
 */

import { context, isSpanContextValid, trace } from '@opentelemetry/api';
import type { Context, TextMapGetter, TextMapPropagator, TextMapSetter } from '@opentelemetry/api';
import { TraceContext } from '../core/trace-context';
import { UnsafeArrayMap } from '../core/map/unsafe-array-map';
import { BaggageField } from '../baggage/baggage-field';
import { BaggageState } from '../baggage/baggage-state';
import { BaggageStateFactory } from '../baggage/baggage-state-factory';
import type { BaggageCodec } from '../baggage/baggage-codec';
import { SingleHeaderCodec } from '../baggage/single-header-codec';
import { BaggageContext } from '../context';
import { getContextWithOtelBaggage } from '../api/baggage';
import type { BaggageConfig } from '../types/schema';

export interface BaggageStatePropagatorOptions {
  codec?: BaggageCodec;
  /** Fields kept in process but never written on inject. */
  redactedFields?: BaggageField[];
}

export class BaggageStatePropagator implements TextMapPropagator {
  private readonly codec: BaggageCodec;
  /** Deduplicated; also pass these to getContextWithOtelBaggage. */
  readonly redactedFields: readonly BaggageField[];

  constructor(
    readonly factory: BaggageStateFactory,
    options: BaggageStatePropagatorOptions = {}
  ) {
    this.codec = options.codec ?? SingleHeaderCodec.INSTANCE;
    const redacted: BaggageField[] = [];
    for (const field of options.redactedFields ?? []) {
      if (!redacted.some((f) => f.equals(field))) redacted.push(field);
    }
    if (redacted.length > UnsafeArrayMap.MAX_FILTERED_KEYS) {
      throw new RangeError(
        `cannot redact more than ${UnsafeArrayMap.MAX_FILTERED_KEYS} fields, got ${redacted.length}`
      );
    }
    this.redactedFields = Object.freeze(redacted);
  }

  static fromConfig(config: BaggageConfig, codec?: BaggageCodec): BaggageStatePropagator {
    return new BaggageStatePropagator(BaggageStateFactory.fromConfig(config), {
      codec,
      redactedFields: config.redactedFields.map((name) => BaggageField.create(name)),
    });
  }

  /** This factory's state in the trace context, if attached. */
  findState(traceContext: TraceContext): BaggageState | undefined {
    for (const next of traceContext.extra) {
      if (next instanceof BaggageState && next.factory === this.factory) return next;
    }
    return undefined;
  }

  inject<Carrier>(otelContext: Context, carrier: Carrier, setter: TextMapSetter<Carrier>): void {
    const traceContext = BaggageContext.getTraceContext(otelContext);
    if (traceContext === undefined) return;
    const state = this.findState(traceContext);
    if (state === undefined) return;

    const value = this.codec.encode(state.toMapFilteringFields(...this.redactedFields), traceContext);
    if (value === null) return;
    for (const key of this.codec.injectKeyNames()) setter.set(carrier, key, value);
  }

  extract<Carrier>(otelContext: Context, carrier: Carrier, getter: TextMapGetter<Carrier>): Context {
    const spanContext = trace.getSpanContext(otelContext);
    if (spanContext === undefined || !isSpanContextValid(spanContext)) return otelContext;

    const state = this.factory.create();
    const header = this.readHeader(carrier, getter);
    if (header !== undefined) this.codec.decode(state, header);

    const extracted = TraceContext.fromSpanContext(spanContext, [state]);
    return BaggageContext.withTraceContext(otelContext, this.factory.decorate(extracted));
  }

  /** {@link getContextWithOtelBaggage} with this propagator's redaction applied. */
  withOtelBaggage(otelContext: Context = context.active()): Context {
    return getContextWithOtelBaggage(otelContext, this.redactedFields);
  }

  fields(): string[] {
    return [...this.codec.injectKeyNames()];
  }

  private readHeader<Carrier>(carrier: Carrier, getter: TextMapGetter<Carrier>): string | undefined {
    for (const key of this.codec.extractKeyNames()) {
      const raw = getter.get(carrier, key);
      const value = Array.isArray(raw) ? raw.join(',') : raw;
      if (value) return value;
    }
    return undefined;
  }
}
