/**
 * Registry error codes.
 *
 * Precondition and capacity failures abort the whole operation. Expected
 * non-results (an already-owned address, an absent key) are never errors.
 */

export const REGISTRY_ERROR = {
  NOT_INITIALIZED: 'NOT_INITIALIZED',
  REGISTER_MISSING: 'REGISTER_MISSING',
  CAPACITY_EXHAUSTED: 'CAPACITY_EXHAUSTED',
  INVALID_NAME: 'INVALID_NAME',
  INVALID_BITMAP: 'INVALID_BITMAP',
  INVALID_SNAPSHOT: 'INVALID_SNAPSHOT',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type RegistryErrorCode = (typeof REGISTRY_ERROR)[keyof typeof REGISTRY_ERROR];

const DEFAULT_MESSAGES: Record<RegistryErrorCode, string> = {
  NOT_INITIALIZED: 'World has not been created yet; run genesis first',
  REGISTER_MISSING: 'Cannot unregister before any component has been registered',
  CAPACITY_EXHAUSTED: 'Component register is full; no bit left in the bitmap',
  INVALID_NAME: 'World name must be 1-32 characters of [A-Za-z0-9_]',
  INVALID_BITMAP: 'Bitmap does not fit the configured width',
  INVALID_SNAPSHOT: 'Snapshot document is malformed',
  INVALID_CONFIG: 'Registry configuration is invalid',
};

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string = DEFAULT_MESSAGES[code]) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
  }
}

export function isRegistryError(value: unknown, code?: RegistryErrorCode): value is RegistryError {
  return value instanceof RegistryError && (code === undefined || value.code === code);
}

/** Capacity exhaustion is surfaced apart from preconditions so callers can tell "full" from "not ready". */
export function isCapacityError(value: unknown): value is RegistryError {
  return isRegistryError(value, REGISTRY_ERROR.CAPACITY_EXHAUSTED);
}

export function isPreconditionError(value: unknown): value is RegistryError {
  return (
    isRegistryError(value, REGISTRY_ERROR.NOT_INITIALIZED) ||
    isRegistryError(value, REGISTRY_ERROR.REGISTER_MISSING)
  );
}
