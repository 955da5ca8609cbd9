/**
 * Result Type for Functional Error Handling
 *
 * Provides a type-safe way to handle expected failure cases without exceptions.
 * Classification results and per-candidate failures are carried this way so
 * that nothing crosses a component boundary as a throw.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Async Utilities
// =============================================================================

/**
 * Wraps a Promise in a Result with a custom error type
 */
export async function fromPromiseWith<T, E>(
  promise: Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (error) {
    return err(errorMapper(error));
  }
}
