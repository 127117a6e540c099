// utils/result.ts
import { PipelineError, toPipelineError } from './pipelineErrors';

export type Result<T, E = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Runs a stage call and captures any failure as an Err.
export const attempt = async <T>(fn: () => Promise<T>): Promise<Result<T>> => {
  try {
    return ok(await fn());
  } catch (e: unknown) {
    return err(toPipelineError(e));
  }
};
