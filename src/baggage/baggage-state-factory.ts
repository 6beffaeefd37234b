/**
 * Creates and forks {@link BaggageState} instances for one set of baggage fields.
 * Several factories may coexist on the same trace context; each only manages its own states.
 */

import { ExtraFactory } from '../core/extra/extra-factory';
import { MAX_SIZE } from '../core/bitset/long-bitset';
import type { BaggageConfig } from '../types/schema';
import { BaggageField } from './baggage-field';
import { BaggageState, type BaggageArray } from './baggage-state';

/** Merge marks their slots in a 64-bit word, so no state can hold more pairs than that. */
export const MAX_DYNAMIC_FIELDS = MAX_SIZE;

export const DEFAULT_UPDATE_ATTEMPTS = 3;

export interface BaggageStateFactoryOptions {
  /** Fields present from the start (deduplicated, in order). */
  fields?: Iterable<BaggageField>;
  /** When true, fields not in `fields` may be added by updates and merges. */
  dynamic?: boolean;
  /** Cap on the total number of fields a state may hold. */
  maxDynamicFields?: number;
  /** Compare-and-swap attempts per update before giving up. */
  updateAttempts?: number;
}

export class BaggageStateFactory extends ExtraFactory<
  BaggageState,
  BaggageStateFactory,
  BaggageArray
> {
  readonly initialFieldList: readonly BaggageField[];
  /** Array index of each static field's key slot, by lowercase name. */
  readonly initialFieldIndices: ReadonlyMap<string, number>;
  readonly initialArrayLength: number;
  readonly isDynamic: boolean;
  readonly maxDynamicFields: number;
  readonly updateAttempts: number;

  private constructor(
    initialState: BaggageArray,
    fields: readonly BaggageField[],
    dynamic: boolean,
    maxDynamicFields: number,
    updateAttempts: number
  ) {
    super(initialState);
    this.initialFieldList = fields;
    this.initialFieldIndices = new Map(fields.map((field, i) => [field.lcName, i * 2]));
    this.initialArrayLength = initialState.length;
    this.isDynamic = dynamic;
    this.maxDynamicFields = maxDynamicFields;
    this.updateAttempts = updateAttempts;
  }

  static create(options: BaggageStateFactoryOptions = {}): BaggageStateFactory {
    const maxDynamicFields = options.maxDynamicFields ?? MAX_DYNAMIC_FIELDS;
    if (!Number.isInteger(maxDynamicFields) || maxDynamicFields < 1 || maxDynamicFields > MAX_DYNAMIC_FIELDS) {
      throw new RangeError(`maxDynamicFields must be between 1 and ${MAX_DYNAMIC_FIELDS}`);
    }
    const updateAttempts = options.updateAttempts ?? DEFAULT_UPDATE_ATTEMPTS;
    if (!Number.isInteger(updateAttempts) || updateAttempts < 1) {
      throw new RangeError('updateAttempts must be at least 1');
    }

    const fields: BaggageField[] = [];
    for (const field of options.fields ?? []) {
      if (field == null) throw new TypeError('fields contains null');
      if (!fields.some((f) => f.equals(field))) fields.push(field);
    }
    if (fields.length > maxDynamicFields) {
      throw new RangeError(`cannot hold ${fields.length} fields with maxDynamicFields ${maxDynamicFields}`);
    }

    const initialState: Array<BaggageField | null> = [];
    for (const field of fields) initialState.push(field, null);

    return new BaggageStateFactory(
      Object.freeze(initialState),
      Object.freeze(fields),
      options.dynamic ?? false,
      maxDynamicFields,
      updateAttempts
    );
  }

  static fromConfig(config: BaggageConfig): BaggageStateFactory {
    return BaggageStateFactory.create({
      fields: config.fields.map((name) => BaggageField.create(name)),
      dynamic: config.dynamic,
      maxDynamicFields: config.maxDynamicFields,
      updateAttempts: config.updateAttempts,
    });
  }

  create(): BaggageState {
    return new BaggageState(this);
  }

  protected isOwnExtra(o: unknown): o is BaggageState {
    return o instanceof BaggageState && o.factory === this;
  }
}
