import { type HarvestError, toHarvestError } from "../errors.js";

export type Result<T, E = HarvestError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Runs a best-effort step and folds its failure into the error side, so the
 * caller decides explicitly whether to ignore it.
 */
export async function attempt<T>(step: () => Promise<T>, fallbackMessage?: string): Promise<Result<T>> {
  try {
    return ok(await step());
  } catch (error) {
    return err(toHarvestError(error, fallbackMessage));
  }
}
