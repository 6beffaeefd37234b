/**
 * Config loader for .baggage/config.yml.
 * Read synchronously so a propagator can be built at boot.
 */

import fs from 'fs';
import { parse } from 'yaml';
import { ConfigError } from '../core/errors';
import { UnsafeArrayMap } from '../core/map/unsafe-array-map';
import type { BaggageConfig } from '../types/schema';

const MAX_FILTERED_KEYS = UnsafeArrayMap.MAX_FILTERED_KEYS;

export const DEFAULT_CONFIG_PATH = './.baggage/config.yml';

export const DEFAULT_BAGGAGE_CONFIG: Readonly<BaggageConfig> = Object.freeze({
  fields: [],
  dynamic: true,
  maxDynamicFields: 64,
  updateAttempts: 3,
  redactedFields: [],
});

export function defaultBaggageConfig(): BaggageConfig {
  return { ...DEFAULT_BAGGAGE_CONFIG, fields: [], redactedFields: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(section: Record<string, unknown>, key: string, fallback: string[]): string[] {
  const value = section[key];
  if (value === undefined || value === null) return [...fallback];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`baggage.${key} must be a list of strings`);
  }
  return value;
}

function readInteger(section: Record<string, unknown>, key: string, fallback: number): number {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigError(`baggage.${key} must be an integer`);
  }
  return value;
}

/** Drops names equal to an earlier one, ignoring case and surrounding whitespace. */
function uniqueNames(names: string[]): string[] {
  const seen = new Set<string>();
  return names.filter((name) => {
    const key = name.trim().toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Reads and caches the YAML config. Exposes the raw document via get() and the validated
 * baggage section via getBaggageConfig(). Accepts an optional configPath for testing.
 */
export class ConfigManager {
  private cfg: Record<string, unknown>;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    const raw = fs.readFileSync(configPath, 'utf8');
    const parsed: unknown = parse(raw);
    if (parsed === null || parsed === undefined) {
      this.cfg = {};
    } else if (isRecord(parsed)) {
      this.cfg = parsed;
    } else {
      throw new ConfigError(`${configPath} must contain a mapping`);
    }
  }

  /** Returns the parsed config object. */
  get(): Record<string, unknown> {
    return this.cfg;
  }

  /** Returns the `baggage:` section with defaults applied; throws ConfigError on bad types. */
  getBaggageConfig(): BaggageConfig {
    const section = this.cfg.baggage;
    if (section === undefined || section === null) return defaultBaggageConfig();
    if (!isRecord(section)) throw new ConfigError('baggage must be a mapping');

    const dynamic = section.dynamic ?? DEFAULT_BAGGAGE_CONFIG.dynamic;
    if (typeof dynamic !== 'boolean') throw new ConfigError('baggage.dynamic must be a boolean');

    const redactedFields = uniqueNames(
      readStringList(section, 'redactedFields', DEFAULT_BAGGAGE_CONFIG.redactedFields)
    );
    if (redactedFields.length > MAX_FILTERED_KEYS) {
      throw new ConfigError(
        `baggage.redactedFields lists ${redactedFields.length} fields; at most ${MAX_FILTERED_KEYS} can be redacted`
      );
    }

    return {
      fields: readStringList(section, 'fields', DEFAULT_BAGGAGE_CONFIG.fields),
      dynamic,
      maxDynamicFields: readInteger(section, 'maxDynamicFields', DEFAULT_BAGGAGE_CONFIG.maxDynamicFields),
      updateAttempts: readInteger(section, 'updateAttempts', DEFAULT_BAGGAGE_CONFIG.updateAttempts),
      redactedFields,
    };
  }
}

/**
 * Loads the baggage config from `configPath`, else BAGGAGE_CONFIG_PATH, else the default path.
 * A missing file yields the defaults; any other failure is thrown.
 */
export function loadBaggageConfig(
  configPath: string = process.env.BAGGAGE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH
): BaggageConfig {
  if (!fs.existsSync(configPath)) return defaultBaggageConfig();
  return new ConfigManager(configPath).getBaggageConfig();
}
