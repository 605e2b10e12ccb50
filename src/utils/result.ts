import { EngineError, type EngineName } from "../errors.js";

export type Result<T, E = EngineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run one best-effort engine call. Anything it throws (or rejects with)
 * comes back as an `EngineError` instead of propagating.
 */
export async function attempt<T>(engine: EngineName, call: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await call());
  } catch (error) {
    return err(error instanceof EngineError ? error : new EngineError(engine, error));
  }
}
