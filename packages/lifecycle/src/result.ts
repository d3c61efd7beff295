import { LifecycleError } from "./errors.js";

export type Result<T, E = LifecycleError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Runs an operation body that signals business failures by throwing a
 * LifecycleError and converts them into a Result. Other errors propagate.
 */
export async function attempt<T>(body: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await body());
  } catch (error) {
    if (error instanceof LifecycleError) return err(error);
    throw error;
  }
}

export function attemptSync<T>(body: () => T): Result<T> {
  try {
    return ok(body());
  } catch (error) {
    if (error instanceof LifecycleError) return err(error);
    throw error;
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
