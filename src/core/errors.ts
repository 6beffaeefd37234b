/**
 * Error types raised by read-only views and configuration loading.
 * Usage errors (bad arguments, capacity) use the built-in TypeError / RangeError.
 */

/** Thrown by every mutator of a read-only map, collection view, iterator or entry. */
export class UnsupportedOperationError extends Error {
  constructor(operation: string) {
    super(`${operation} is not supported on a read-only view`);
    this.name = 'UnsupportedOperationError';
  }
}

/** Thrown when the baggage config file holds a value of the wrong shape. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`[baggage-state] ${message}`);
    this.name = 'ConfigError';
  }
}
