/**
 * Simplified Result Pattern
 * Basic discriminated union for error handling without complex monadic utilities
 */

export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T, E = never>(value: T): Result<T, E> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <E = string, T = never>(error: E): Result<T, E> => ({ ok: false, error });
