// ============================================
// Result Type
// ============================================

/**
 * Successful outcome carrying a value.
 */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed outcome carrying an error.
 */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Discriminated union for operations that can fail without throwing.
 *
 * @example
 * ```typescript
 * const result = loadContent(path, encodings);
 * if (result.ok) {
 *   use(result.value);
 * } else {
 *   report(result.error);
 * }
 * ```
 */
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

/**
 * Create a successful result.
 */
export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

/**
 * Create a failed result.
 */
export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
