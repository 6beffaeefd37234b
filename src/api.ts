/**
 * Public entry point.
 */
export { BaggageField } from './baggage/baggage-field';
export { BaggageState, type BaggageArray } from './baggage/baggage-state';
export {
  BaggageStateFactory,
  DEFAULT_UPDATE_ATTEMPTS,
  MAX_DYNAMIC_FIELDS,
  type BaggageStateFactoryOptions,
} from './baggage/baggage-state-factory';
export type { BaggageCodec } from './baggage/baggage-codec';
export { BAGGAGE_HEADER, SingleHeaderCodec } from './baggage/single-header-codec';
export { TraceContext, type TraceContextInit } from './core/trace-context';
export { Extra, type ClaimState } from './core/extra/extra';
export { ExtraFactory } from './core/extra/extra-factory';
export {
  CollectionView,
  MapEntry,
  ReadOnlyIterator,
  UnsafeArrayMap,
  type PackedArray,
} from './core/map/unsafe-array-map';
export { ConfigError, UnsupportedOperationError } from './core/errors';
export {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  defaultBaggageConfig,
  loadBaggageConfig,
} from './config/config-manager';
export type { BaggageConfig } from './types/schema';
export { BaggageContext, BAGGAGE_TRACE_CONTEXT_KEY } from './context';
export {
  BaggageStatePropagator,
  type BaggageStatePropagatorOptions,
} from './propagation/baggage-state-propagator';
export { getContextWithOtelBaggage } from './api/baggage';
