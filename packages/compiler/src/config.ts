import { DEFAULT_MAX_ALIAS_DEPTH } from "./types/alias.js";
import type { SourceSpan } from "./diagnostics/index.js";
import { readPositiveIntEnv } from "./env.js";

export const MAX_ALIAS_DEPTH_ENV = "PORTCHECK_MAX_ALIAS_DEPTH";

export type WireCheckOptions = {
  /**
   * How many aliases may be expanded along a single path before the type
   * is reported as an alias cycle. Defaults to `PORTCHECK_MAX_ALIAS_DEPTH`
   * when set, otherwise 64.
   */
  maxAliasDepth?: number;
  /** Location of the declaration, copied onto any diagnostic. */
  span?: SourceSpan;
};

export type ResolvedWireCheckOptions = {
  maxAliasDepth: number;
  span?: SourceSpan;
};

export const resolveWireCheckOptions = (
  options: WireCheckOptions = {},
): ResolvedWireCheckOptions => ({
  maxAliasDepth:
    options.maxAliasDepth ??
    readPositiveIntEnv(MAX_ALIAS_DEPTH_ENV) ??
    DEFAULT_MAX_ALIAS_DEPTH,
  span: options.span,
});
