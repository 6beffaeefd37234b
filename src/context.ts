/**
 * Carries the current {@link TraceContext} inside the OpenTelemetry Context.
 * Read via BaggageContext getters; write via withTraceContext/decorate/startChild/run.
 */

import { context, createContextKey, trace } from '@opentelemetry/api';
import type { Context } from '@opentelemetry/api';
import { TraceContext } from './core/trace-context';
import type { BaggageStateFactory } from './baggage/baggage-state-factory';

/** Context key under which the trace context is stored. Exported for tests. */
export const BAGGAGE_TRACE_CONTEXT_KEY = createContextKey('baggage_state_trace_context');

/**
 * Returns the trace context stored in the given OTel context, if any.
 * When otelContext is omitted, uses context.active().
 */
function getTraceContext(otelContext: Context = context.active()): TraceContext | undefined {
  const value = otelContext.getValue(BAGGAGE_TRACE_CONTEXT_KEY);
  return value instanceof TraceContext ? value : undefined;
}

/**
 * Returns a new OTel context holding the trace context and its span context. Does not mutate
 * otelContext.
 */
function withTraceContext(otelContext: Context, traceContext: TraceContext): Context {
  const withSpan = trace.setSpanContext(otelContext, traceContext.toSpanContext());
  return withSpan.setValue(BAGGAGE_TRACE_CONTEXT_KEY, traceContext);
}

/**
 * Lets the factory claim or fork its state for the stored trace context. Returns otelContext
 * itself when there is no trace context or the factory left it unchanged.
 */
function decorate(factory: BaggageStateFactory, otelContext: Context = context.active()): Context {
  const current = getTraceContext(otelContext);
  if (current === undefined) return otelContext;
  const decorated = factory.decorate(current);
  return decorated === current ? otelContext : withTraceContext(otelContext, decorated);
}

/**
 * Derives a child span of the stored trace context and decorates it, so the child's baggage
 * updates stay invisible to the parent.
 *
 * @throws Error when otelContext holds no trace context
 */
function startChild(
  factory: BaggageStateFactory,
  spanId: string,
  otelContext: Context = context.active()
): Context {
  const parent = getTraceContext(otelContext);
  if (parent === undefined) {
    throw new Error('startChild: no trace context in the given context');
  }
  return withTraceContext(otelContext, factory.decorate(parent.newChild(spanId)));
}

/** Runs fn inside an OTel scope holding the trace context. */
function run<T>(traceContext: TraceContext, fn: () => T): T {
  return context.with(withTraceContext(context.active(), traceContext), fn);
}

export const BaggageContext = {
  getTraceContext,
  withTraceContext,
  decorate,
  startChild,
  run,
};
