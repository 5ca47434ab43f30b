import type { NuforgeError } from '../types/index.js';

/**
 * Discriminated result for operations whose failures callers must render per kind.
 *
 * @example
 * ```typescript
 * const parsed = tryParseVersion(text);
 * if (parsed.success) {
 *   console.log(formatVersion(parsed.value));
 * } else {
 *   console.error(parsed.error.message);
 * }
 * ```
 */
export type Result<T, E = NuforgeError> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

// ============================================================================
// Constructors
// ============================================================================

export const ok = <T>(value: T): Result<T, never> => ({ success: true, value });

export const fail = <E>(error: E): Result<never, E> => ({ success: false, error });
