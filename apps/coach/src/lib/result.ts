import type { Result, StageError, StageErrorKind } from '@standup-coach/shared';

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function stageError(kind: StageErrorKind, message: string, cause?: unknown): StageError {
    return cause === undefined ? { kind, message } : { kind, message, cause };
}

/**
 * Returns the value of a successful result, or the fallback for a failed one.
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
    return result.ok ? result.value : fallback;
}
