/**
 * Result type for per-file pipeline stages.
 *
 * Stages return a Result instead of throwing so one bad file never aborts
 * the run.
 *
 * @example
 * ```typescript
 * const read = await tryAsync(() => fs.readFile(path));
 * if (!read.ok) {
 *   return failed(candidate, 'Read', read.error);
 * }
 * ```
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

/**
 * Run a synchronous step, capturing anything it throws.
 */
export function trySync<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

/**
 * Run an async step, capturing rejections.
 */
export async function tryAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
