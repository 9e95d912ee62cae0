import {
  type Diagnostic,
  diagnosticFromCode,
  type SourceSpan,
  type WireDirection,
} from "../diagnostics/index.js";
import { err, type Result, unit } from "../result.js";
import {
  resolveWireCheckOptions,
  type ResolvedWireCheckOptions,
  type WireCheckOptions,
} from "../config.js";
import { incrementTraceCounter } from "../trace.js";
import {
  type CanonicalType,
  collectArrowComponents,
  expandAlias,
  expandHead,
  isArray,
  isJson,
  isList,
  isMaybe,
  isPrimitive,
  isStream,
  isTuple,
  isVarying,
  matchApplied,
  namedRef,
  showType,
  type TypeRef,
} from "../types/index.js";
import { wireErrorDocument } from "./report.js";

export type SignalKind = "stream" | "varying";

export type WireProblem =
  | { reason: "unsupported-type" }
  | { reason: "free-type-variable" }
  | { reason: "contains-functions" }
  | { reason: "higher-order-functions" }
  | { reason: "signal-contains-function"; signal: SignalKind }
  | { reason: "extended-record" }
  | { reason: "alias-cycle"; alias: TypeRef };

export type WireReason = WireProblem["reason"];

/** The first violation found in a port type, with everything needed to report it. */
export type WireTypeError = WireProblem & {
  name: string;
  direction: WireDirection;
  rootType: CanonicalType;
  offendingType: CanonicalType;
};

type WireContext = {
  direction: WireDirection;
  name: string;
  rootType: CanonicalType;
  maxAliasDepth: number;
};

type VisitState = {
  seenFunc: boolean;
  seenSignal?: SignalKind;
  aliasDepth: number;
};

type WireResult = Result<WireTypeError, undefined>;

const fail = (
  ctx: WireContext,
  offendingType: CanonicalType,
  problem: WireProblem,
): WireResult => {
  const error: WireTypeError = {
    ...problem,
    name: ctx.name,
    direction: ctx.direction,
    rootType: ctx.rootType,
    offendingType,
  };
  return err(error);
};

const validate = (
  ctx: WireContext,
  state: VisitState,
  type: CanonicalType,
): WireResult => {
  switch (type.kind) {
    case "aliased":
      if (state.aliasDepth >= ctx.maxAliasDepth) {
        return fail(ctx, type, { reason: "alias-cycle", alias: type.alias });
      }
      return validate(
        ctx,
        { ...state, aliasDepth: state.aliasDepth + 1 },
        expandAlias(type),
      );
    case "named":
      return isJson(type.ref) || isPrimitive(type.ref) || isTuple(type.ref)
        ? unit
        : fail(ctx, type, { reason: "unsupported-type" });
    case "applied":
      return validateApplied(ctx, state, type);
    case "variable":
      return fail(ctx, type, { reason: "free-type-variable" });
    case "function":
      return validateFunction(ctx, state, type);
    case "record":
      if (type.extension !== undefined) {
        return fail(ctx, type, { reason: "extended-record" });
      }
      return validateAll(
        ctx,
        state,
        type.fields.map((field) => field.type),
      );
  }
  return exhaustive(type);
};

const validateAll = (
  ctx: WireContext,
  state: VisitState,
  types: readonly CanonicalType[],
): WireResult => {
  for (const type of types) {
    const result = validate(ctx, state, type);
    if ("err" in result) return result;
  }
  return unit;
};

const validateApplied = (
  ctx: WireContext,
  state: VisitState,
  type: Extract<CanonicalType, { kind: "applied" }>,
): WireResult => {
  if (type.args.length === 0) {
    return validate(ctx, state, type.constructor);
  }

  const head = namedRef(type.constructor);
  const [only] = type.args;
  if (head && only && type.args.length === 1) {
    if (isMaybe(head) || isArray(head) || isList(head)) {
      return validate(ctx, state, only);
    }
  }

  if (head && isTuple(head)) {
    return validateAll(ctx, state, type.args);
  }

  return fail(ctx, type, { reason: "unsupported-type" });
};

const validateFunction = (
  ctx: WireContext,
  state: VisitState,
  type: Extract<CanonicalType, { kind: "function" }>,
): WireResult => {
  if (ctx.direction === "input") {
    return fail(ctx, type, { reason: "contains-functions" });
  }
  if (state.seenFunc) {
    return fail(ctx, type, { reason: "higher-order-functions" });
  }
  if (state.seenSignal) {
    return fail(ctx, type, {
      reason: "signal-contains-function",
      signal: state.seenSignal,
    });
  }
  return validateAll(
    ctx,
    { ...state, seenFunc: true },
    collectArrowComponents(type),
  );
};

const signalOf = (
  type: CanonicalType,
): { signal: SignalKind; inner: CanonicalType } | undefined => {
  const stream = matchApplied(type, isStream, 1);
  if (stream?.args[0]) return { signal: "stream", inner: stream.args[0] };
  const varying = matchApplied(type, isVarying, 1);
  if (varying?.args[0]) return { signal: "varying", inner: varying.args[0] };
  return undefined;
};

/**
 * Checks that a port type can cross the host boundary in `direction`.
 * One outer Stream or Varying wrapper is allowed; the first violation
 * found depth-first, left to right, is returned.
 */
export const validateWireType = (
  direction: WireDirection,
  name: string,
  type: CanonicalType,
  options: ResolvedWireCheckOptions = resolveWireCheckOptions(),
): WireResult => {
  const ctx: WireContext = {
    direction,
    name,
    rootType: type,
    maxAliasDepth: options.maxAliasDepth,
  };

  const head = expandHead(type, { maxDepth: options.maxAliasDepth });
  if ("err" in head) {
    return fail(ctx, type, { reason: "alias-cycle", alias: head.err.alias });
  }

  const signal = signalOf(head.ok.type);
  if (signal) {
    return validate(
      ctx,
      { seenFunc: false, seenSignal: signal.signal, aliasDepth: head.ok.depth },
      signal.inner,
    );
  }
  return validate(
    ctx,
    { seenFunc: false, aliasDepth: head.ok.depth },
    head.ok.type,
  );
};

export const wireReasonText = (problem: WireProblem): string => {
  switch (problem.reason) {
    case "unsupported-type":
      return "It contains an unsupported type";
    case "free-type-variable":
      return "It contains a free type variable";
    case "contains-functions":
      return "It contains functions";
    case "higher-order-functions":
      return "It contains higher-order functions";
    case "signal-contains-function":
      return problem.signal === "stream"
        ? "It is a stream that contains a function"
        : "It is a varying value that contains a function";
    case "extended-record":
      return "It contains extended records with free type variables";
    case "alias-cycle":
      return "It contains an alias that expands into itself";
  }
  return exhaustive(problem);
};

export const wireTypeDiagnostic = (
  error: WireTypeError,
  span?: SourceSpan,
): Diagnostic => {
  const params = {
    direction: error.direction,
    name: error.name,
    rootType: showType(error.rootType),
    offendingType: showType(error.offendingType),
  };
  const document = wireErrorDocument({
    direction: error.direction,
    name: error.name,
    rootType: error.rootType,
    offendingType: error.offendingType,
    reason: wireReasonText(error),
  });

  switch (error.reason) {
    case "unsupported-type":
      return diagnosticFromCode({
        code: "WR0001",
        params: { kind: "unsupported-type", ...params },
        span,
        document,
      });
    case "free-type-variable":
      return diagnosticFromCode({
        code: "WR0002",
        params: { kind: "free-type-variable", ...params },
        span,
        document,
      });
    case "contains-functions":
      return diagnosticFromCode({
        code: "WR0003",
        params: { kind: "contains-functions", ...params },
        span,
        document,
      });
    case "higher-order-functions":
      return diagnosticFromCode({
        code: "WR0004",
        params: { kind: "higher-order-functions", ...params },
        span,
        document,
      });
    case "signal-contains-function":
      return diagnosticFromCode({
        code: "WR0005",
        params: {
          kind: "signal-contains-function",
          signal: error.signal,
          ...params,
        },
        span,
        document,
      });
    case "extended-record":
      return diagnosticFromCode({
        code: "WR0006",
        params: { kind: "extended-record", ...params },
        span,
        document,
      });
    case "alias-cycle":
      return diagnosticFromCode({
        code: "WR0007",
        params: { kind: "alias-cycle", alias: error.alias.name, ...params },
        span,
        document,
      });
  }
  return exhaustive(error);
};

const checkWire = (
  direction: WireDirection,
  name: string,
  type: CanonicalType,
  options?: WireCheckOptions,
): Result<Diagnostic, undefined> => {
  const resolved = resolveWireCheckOptions(options);
  incrementTraceCounter(`wire.${direction}.checks`);
  const result = validateWireType(direction, name, type, resolved);
  if ("ok" in result) return result;
  const diagnostic = wireTypeDiagnostic(result.err, resolved.span);
  incrementTraceCounter(`wire.failures.${diagnostic.code}`);
  return err(diagnostic);
};

export const checkInput = (
  name: string,
  type: CanonicalType,
  options?: WireCheckOptions,
): Result<Diagnostic, undefined> => checkWire("input", name, type, options);

export const checkOutput = (
  name: string,
  type: CanonicalType,
  options?: WireCheckOptions,
): Result<Diagnostic, undefined> => checkWire("output", name, type, options);

const exhaustive = (_value: never): never => _value;
