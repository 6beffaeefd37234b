/**
 * Base type for one mutable element of a trace context's extra list, managed by an
 * {@link ExtraFactory}. State is copy-on-write behind an {@link AtomicReference}; the factory
 * forks and merges it so that child updates stay invisible to parents and siblings.
 */

import { AtomicReference } from './atomic-reference';
import type { ExtraFactory } from './extra-factory';

/** Ownership marker: which (traceId, spanId) this instance belongs to, if any. */
export type ClaimState =
  | { kind: 'unclaimed' }
  | { kind: 'claimed'; traceId: string; spanId: string };

const UNCLAIMED: ClaimState = { kind: 'unclaimed' };

export abstract class Extra<E extends Extra<E, F, S>, F extends ExtraFactory<E, F, S>, S> {
  readonly internal: AtomicReference<S>;
  private readonly claim = new AtomicReference<ClaimState>(UNCLAIMED);

  protected constructor(readonly factory: F) {
    this.internal = new AtomicReference<S>(factory.initialState);
  }

  /** The current state; treat it as immutable. */
  state(): S {
    return this.internal.get();
  }

  claimedBy(): ClaimState {
    return this.claim.get();
  }

  /**
   * Claims this instance for the given span. Succeeds when unclaimed, or when already claimed by
   * the same (traceId, spanId).
   */
  tryToClaim(traceId: string, spanId: string): boolean {
    const current = this.claim.get();
    if (current.kind === 'claimed') {
      return current.traceId === traceId && current.spanId === spanId;
    }
    if (this.claim.compareAndSet(current, { kind: 'claimed', traceId, spanId })) return true;
    return this.tryToClaim(traceId, spanId);
  }

  /**
   * Folds another instance's state into ours. Values present in ours win; returns the current
   * state unchanged when there is nothing to add.
   */
  abstract mergeStateKeepingOursOnConflict(theirs: E): S;

  protected abstract stateEquals(thatState: unknown): boolean;

  protected abstract stateHashCode(): number;

  protected abstract stateString(): string;

  equals(o: unknown): boolean {
    if (o === this) return true;
    if (!(o instanceof Extra) || o.factory !== this.factory) return false;
    return this.stateEquals(o.state());
  }

  hashCode(): number {
    return this.stateHashCode();
  }

  toString(): string {
    return `${this.constructor.name}{${this.stateString()}}`;
  }
}
