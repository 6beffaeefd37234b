/**
 * Mirrors baggage fields into OTel Baggage for OpenTelemetry-native propagation.
 * Use when downstream services read the standard W3C baggage propagator instead of ours.
 */
import {
  context,
  propagation,
  baggageEntryMetadataFromString,
} from '@opentelemetry/api';
import type { Context } from '@opentelemetry/api';
import type { BaggageField } from '../baggage/baggage-field';
import { BaggageState } from '../baggage/baggage-state';
import { BaggageContext } from '../context';

const METADATA_STR = 'baggage-state';

/**
 * Returns otelContext with the non-null value of every baggage field on its trace context set as
 * an OTel Baggage entry, except `redactedFields`. Returns otelContext unchanged when there is
 * nothing to copy. Pass the propagator's `redactedFields` so the W3C baggage header carries no
 * more than our own header does.
 */
export function getContextWithOtelBaggage(
  otelContext: Context = context.active(),
  redactedFields: readonly BaggageField[] = []
): Context {
  const traceContext = BaggageContext.getTraceContext(otelContext);
  if (traceContext === undefined) return otelContext;

  let baggage = propagation.getBaggage(otelContext) ?? propagation.createBaggage();
  let changed = false;
  for (const next of traceContext.extra) {
    if (!(next instanceof BaggageState)) continue;
    for (const entry of next.toMapFilteringFields(...redactedFields)) {
      if (entry.value === null) continue;
      baggage = baggage.setEntry(entry.key.name, {
        value: entry.value,
        metadata: baggageEntryMetadataFromString(METADATA_STR),
      });
      changed = true;
    }
  }
  return changed ? propagation.setBaggage(otelContext, baggage) : otelContext;
}
