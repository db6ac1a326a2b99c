/**
 * Result Values
 *
 * Explicit success/failure values for operations whose failures are expected
 * and recoverable (one source, one sentence, one image). Callers branch on
 * `success` instead of catching.
 */

export type Result<T, E extends Error = Error> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(value: T): { readonly success: true; readonly value: T } {
  return { success: true, value };
}

export function err<E extends Error>(error: E): { readonly success: false; readonly error: E } {
  return { success: false, error };
}

/**
 * Runs an async operation and captures a rejection as a typed failure.
 *
 * @example
 * const fetched = await attempt(
 *   () => acquisition.fetch(url),
 *   (cause) => new AcquisitionFailure(url, cause)
 * );
 * if (!fetched.success) log.warn(fetched.error.message);
 */
export async function attempt<T, E extends Error>(
  fn: () => Promise<T>,
  mapError: (cause: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await fn());
  } catch (cause) {
    return err(mapError(cause));
  }
}

/**
 * Returns the value of a successful result, or the fallback otherwise.
 */
export function unwrapOr<T, E extends Error>(result: Result<T, E>, fallback: T): T {
  return result.success ? result.value : fallback;
}
