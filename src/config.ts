/**
 * Global constants for the ECS registry.
 * All magic numbers live here, nowhere else.
 */

import { REGISTRY_ERROR, RegistryError } from './core/errors';
import { isLogLevel, type LogLevel } from './core/logger';

// ── Bitmap ──────────────────────────────────────────────────────
/** Width of an unsigned 128-bit integer, the widest bitmap the registry supports. */
export const MAX_BITMAP_WIDTH = 128;
export const MIN_BITMAP_WIDTH = 2;
export const DEFAULT_BITMAP_WIDTH = MAX_BITMAP_WIDTH;

// ── World ───────────────────────────────────────────────────────
export const WORLD_NAME_MAX_LENGTH = 32;
export const WORLD_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

// ── Snapshot ────────────────────────────────────────────────────
export const SNAPSHOT_VERSION = 1;

// ── Registry Runtime Config ─────────────────────────────────────

/**
 * How de-registration finds an address in the register.
 * `scan` matches anywhere in insertion order; `binary-search` assumes the list
 * is sorted and can miss addresses that were appended out of order.
 */
export type UnregisterLookup = 'scan' | 'binary-search';

const UNREGISTER_LOOKUPS: readonly UnregisterLookup[] = ['scan', 'binary-search'];

export interface RegistryConfig {
  bitmapWidth: number;
  unregisterLookup: UnregisterLookup;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: RegistryConfig;
  errors: string[];
}

export const DEFAULT_REGISTRY_CONFIG: Readonly<RegistryConfig> = {
  bitmapWidth: DEFAULT_BITMAP_WIDTH,
  unregisterLookup: 'scan',
  logLevel: 'info',
};

function isUnregisterLookup(value: unknown): value is UnregisterLookup {
  return UNREGISTER_LOOKUPS.some((lookup) => lookup === value);
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 */
export function validateAndLoadConfig(
  overrides: Partial<RegistryConfig> = {},
): ConfigValidationResult {
  const config: RegistryConfig = { ...DEFAULT_REGISTRY_CONFIG, ...overrides };
  const errors: string[] = [];

  const width: unknown = config.bitmapWidth;
  if (typeof width !== 'number' || !Number.isInteger(width)) {
    errors.push('bitmapWidth must be an integer');
  } else if (width < MIN_BITMAP_WIDTH || width > MAX_BITMAP_WIDTH) {
    errors.push(`bitmapWidth must be between ${MIN_BITMAP_WIDTH} and ${MAX_BITMAP_WIDTH}, got ${width}`);
  }

  if (!isUnregisterLookup(config.unregisterLookup)) {
    errors.push(`unregisterLookup must be one of ${UNREGISTER_LOOKUPS.join(', ')}`);
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push('logLevel must be one of debug, info, warn, error');
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}

/**
 * Read config overrides from environment variables.
 * Unset variables are left out so defaults apply. A value that cannot be
 * parsed throws INVALID_CONFIG; range checks are left to
 * `validateAndLoadConfig`.
 */
export function getEnvConfig(
  env: Record<string, string | undefined> = process.env,
): Partial<RegistryConfig> {
  const overrides: Partial<RegistryConfig> = {};

  const width = env.ECS_BITMAP_WIDTH;
  if (width !== undefined && width.trim() !== '') {
    const parsed = Number(width);
    if (!Number.isInteger(parsed)) {
      throw new RegistryError(
        REGISTRY_ERROR.INVALID_CONFIG,
        `ECS_BITMAP_WIDTH must be an integer, got "${width}"`,
      );
    }
    overrides.bitmapWidth = parsed;
  }

  const lookup = env.ECS_UNREGISTER_LOOKUP;
  if (lookup !== undefined) {
    if (isUnregisterLookup(lookup)) {
      overrides.unregisterLookup = lookup;
    } else {
      throw new RegistryError(
        REGISTRY_ERROR.INVALID_CONFIG,
        `ECS_UNREGISTER_LOOKUP must be one of ${UNREGISTER_LOOKUPS.join(', ')}, got "${lookup}"`,
      );
    }
  }

  const level = env.ECS_LOG_LEVEL;
  if (level !== undefined) {
    if (isLogLevel(level)) {
      overrides.logLevel = level;
    } else {
      throw new RegistryError(
        REGISTRY_ERROR.INVALID_CONFIG,
        `ECS_LOG_LEVEL must be one of debug, info, warn, error, got "${level}"`,
      );
    }
  }

  return overrides;
}
