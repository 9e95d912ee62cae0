/**
 * Outcome of a check that can fail with a value instead of throwing.
 *
 * ```ts
 * const result = checkInput("clicks", named(BUILTINS.int));
 * if ("err" in result) report(result.err);
 * ```
 */
export type Result<TErr, TOk> = { ok: TOk } | { err: TErr };

export const ok = <T>(val: T): { ok: T } => ({ ok: val });

export const err = <T>(val: T): { err: T } => ({ err: val });

/** Shared success value for checks that produce nothing. */
export const unit: { ok: undefined } = ok(undefined);
