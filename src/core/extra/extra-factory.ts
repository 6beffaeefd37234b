/**
 * Factory that manages a single mutable element of {@link TraceContext.extra} per context.
 *
 * If your data is constant through the trace, do not use this: add it to the extra list when the
 * context is extracted and it is copied to children as is.
 *
 * The managed {@link Extra} is copy-on-write internally, but still mutable. {@link decorate} forks
 * its state so that updates in a child span are invisible to the parent and to siblings; it must
 * run on every new trace context.
 */

import type { TraceContext } from '../trace-context';
import type { Extra } from './extra';

export abstract class ExtraFactory<E extends Extra<E, F, S>, F extends ExtraFactory<E, F, S>, S> {
  /** Shared by every new instance until its first state change. */
  readonly initialState: S;

  protected constructor(initialState: S) {
    if (initialState == null) throw new TypeError('initialState == null');
    this.initialState = initialState;
  }

  /**
   * Creates a new instance with this factory's initial state. Adding more than one result to the
   * same context's extra list is a programming error, reported by {@link decorate}.
   */
  abstract create(): E;

  /** True when `o` was created by this factory; other factories' instances are left alone. */
  protected abstract isOwnExtra(o: unknown): o is E;

  /**
   * Copy-on-write update. Only call after checking the values are not already the same.
   *
   * @returns false on a lost race: re-read the state and try again if still necessary.
   */
  compareAndSetState(extra: E, expectedState: S, newState: S): boolean {
    if (extra == null) throw new TypeError('extra == null');
    if (expectedState == null) throw new TypeError('expectedState == null');
    if (newState == null) throw new TypeError('newState == null');
    return extra.internal.compareAndSet(expectedState, newState);
  }

  /**
   * Ensures exactly one instance in `context.extra` is claimed by this context's span, merging
   * any state inherited from an ancestor into it. Returns the input when nothing changes.
   */
  decorate(context: TraceContext): TraceContext {
    if (context == null) throw new TypeError('context == null');
    const { traceId, spanId } = context;

    let claimed: E | null = null;
    let existingIndex = -1;
    for (let i = 0; i < context.extra.length; i++) {
      const next = context.extra[i];
      if (!this.isOwnExtra(next)) continue;

      if (claimed === null && next.tryToClaim(traceId, spanId)) {
        claimed = next;
        continue;
      }

      if (existingIndex !== -1) {
        throw new Error('BUG: something added the result of create() multiple times to context.extra');
      }
      existingIndex = i;
    }

    // Easiest when there is neither existing state to assign, nor need to change context.extra
    if (claimed !== null && existingIndex === -1) return context;

    const mutableExtraList = [...context.extra];

    if (claimed === null) {
      claimed = this.create();
      claimed.tryToClaim(traceId, spanId);
      mutableExtraList.push(claimed);
    }

    if (existingIndex !== -1) {
      const existing = context.extra[existingIndex];
      mutableExtraList.splice(existingIndex, 1);
      if (this.isOwnExtra(existing)) this.adoptState(claimed, existing);
    }

    return context.withExtra(mutableExtraList);
  }

  private adoptState(claimed: E, existing: E): void {
    // A claimed instance that never changed simply takes the ancestor's state
    if (claimed.state() === this.initialState) {
      claimed.internal.set(existing.state());
    } else if (existing.state() !== this.initialState) {
      const update = claimed.mergeStateKeepingOursOnConflict(existing);
      if (update == null) {
        throw new TypeError('BUG: mergeStateKeepingOursOnConflict returned null');
      }
      claimed.internal.set(update);
    }
  }
}
