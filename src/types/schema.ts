/**
 * Shared configuration shapes.
 */

/** Validated `baggage:` section of the config file. */
export interface BaggageConfig {
  /** Field names present on every trace from the start. */
  fields: string[];
  /** Whether updates and merges may add fields not listed in `fields`. */
  dynamic: boolean;
  /** Cap on the total number of fields one trace may carry. */
  maxDynamicFields: number;
  /** Compare-and-swap attempts per update before it is reported as not applied. */
  updateAttempts: number;
  /** Field names never written to outgoing headers. */
  redactedFields: string[];
}
