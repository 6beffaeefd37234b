/**
 * Immutable trace identifiers plus the ordered list of extra state objects that plugins attach.
 * "Changing" a context always means building a new one around a new list.
 */

import {
  isValidSpanId,
  isValidTraceId,
  TraceFlags,
  type SpanContext,
} from '@opentelemetry/api';

export interface TraceContextInit {
  traceId: string;
  spanId: string;
  parentId?: string;
  sampled?: boolean;
  extra?: readonly unknown[];
}

export class TraceContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentId?: string;
  readonly sampled: boolean;
  readonly extra: readonly unknown[];

  private constructor(init: TraceContextInit) {
    this.traceId = init.traceId;
    this.spanId = init.spanId;
    if (init.parentId !== undefined) this.parentId = init.parentId;
    this.sampled = init.sampled ?? false;
    this.extra = Object.freeze([...(init.extra ?? [])]);
  }

  /** Validates ids in W3C form: 32 hex trace id, 16 hex span id, neither all zeros. */
  static create(init: TraceContextInit): TraceContext {
    if (init == null) throw new TypeError('context == null');
    if (!isValidTraceId(init.traceId)) throw new TypeError(`invalid traceId: ${init.traceId}`);
    if (!isValidSpanId(init.spanId)) throw new TypeError(`invalid spanId: ${init.spanId}`);
    if (init.parentId !== undefined && !isValidSpanId(init.parentId)) {
      throw new TypeError(`invalid parentId: ${init.parentId}`);
    }
    return new TraceContext(init);
  }

  static fromSpanContext(spanContext: SpanContext, extra: readonly unknown[] = []): TraceContext {
    return TraceContext.create({
      traceId: spanContext.traceId,
      spanId: spanContext.spanId,
      sampled: (spanContext.traceFlags & TraceFlags.SAMPLED) === TraceFlags.SAMPLED,
      extra,
    });
  }

  toSpanContext(): SpanContext {
    return {
      traceId: this.traceId,
      spanId: this.spanId,
      traceFlags: this.sampled ? TraceFlags.SAMPLED : TraceFlags.NONE,
      isRemote: false,
    };
  }

  /** A child of this context with a new span id, sharing the same extra list. */
  newChild(spanId: string): TraceContext {
    return TraceContext.create({
      traceId: this.traceId,
      spanId,
      parentId: this.spanId,
      sampled: this.sampled,
      extra: this.extra,
    });
  }

  withExtra(extra: readonly unknown[]): TraceContext {
    return new TraceContext({
      traceId: this.traceId,
      spanId: this.spanId,
      parentId: this.parentId,
      sampled: this.sampled,
      extra,
    });
  }

  /** First element of `extra` of the given class, or null. */
  findExtra<T>(type: abstract new (...args: never[]) => T): T | null {
    for (const next of this.extra) {
      if (next instanceof type) return next;
    }
    return null;
  }

  toString(): string {
    return `${this.traceId}/${this.spanId}`;
  }
}
