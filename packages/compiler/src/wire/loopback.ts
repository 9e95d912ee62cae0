import { type Diagnostic, diagnosticFromCode } from "../diagnostics/index.js";
import { err, ok, type Result } from "../result.js";
import { resolveWireCheckOptions, type WireCheckOptions } from "../config.js";
import { incrementTraceCounter } from "../trace.js";
import {
  applied,
  BUILTINS,
  type CanonicalType,
  deepDealias,
  isMailbox,
  isResult,
  isStream,
  matchApplied,
  showType,
  typesEqual,
} from "../types/index.js";
import { loopbackErrorDocument } from "./report.js";

/** A `{ mailbox : Mailbox a, stream : Stream a }` feedback loop. */
export type MailboxLoopback = {
  kind: "mailbox-loopback";
  name: string;
  type: CanonicalType;
};

/**
 * A stream of results fed by an implementation that runs promises.
 * `promiseType` is the declared type with `Result` replaced by `Promise`.
 */
export type PromiseLoopback<TExpr> = {
  kind: "promise-loopback";
  name: string;
  promiseType: CanonicalType;
  expr: TExpr;
  originalType: CanonicalType;
};

export type LoopbackDeclaration<TExpr> =
  | MailboxLoopback
  | PromiseLoopback<TExpr>;

const WRITABLE_STREAM_EXPLANATION = [
  "A loopback like this must be a WritableStream.",
] as const;

const PROMISE_STREAM_EXPLANATION = [
  "A loopback that runs promises must be a stream of results.",
  "Something like the following:\n",
  "    Stream (Result Http.Error String)",
  "    Stream (Result x ())",
] as const;

const matchWritableStream = (type: CanonicalType): boolean => {
  if (type.kind !== "record" || type.extension !== undefined) return false;
  if (type.fields.length !== 2) return false;
  const mailboxField = type.fields.find((field) => field.name === "mailbox");
  const streamField = type.fields.find((field) => field.name === "stream");
  if (!mailboxField || !streamField) return false;

  const mailbox = matchApplied(mailboxField.type, isMailbox, 1);
  const stream = matchApplied(streamField.type, isStream, 1);
  const [a] = mailbox?.args ?? [];
  const [b] = stream?.args ?? [];
  return a !== undefined && b !== undefined && typesEqual(a, b);
};

const promiseTypeOf = (type: CanonicalType): CanonicalType | undefined => {
  const stream = matchApplied(type, isStream, 1);
  const [inner] = stream?.args ?? [];
  if (!stream || !inner) return undefined;
  const result = matchApplied(inner, isResult, 2);
  if (!result) return undefined;
  return applied(stream.ref, [applied(BUILTINS.promise, result.args)]);
};

/**
 * Classifies a loopback declaration. Without an implementation it must be
 * a writable stream; with one it must be a stream of results, which is
 * rewritten into a stream of promises.
 */
export const loopback = <TExpr>(
  name: string,
  expr: TExpr | undefined,
  type: CanonicalType,
  options?: WireCheckOptions,
): Result<Diagnostic, LoopbackDeclaration<TExpr>> => {
  const { maxAliasDepth, span } = resolveWireCheckOptions(options);
  const expanded = deepDealias(type, { maxDepth: maxAliasDepth });
  if ("err" in expanded) {
    incrementTraceCounter("loopback.failures.LB0003");
    return err(
      diagnosticFromCode({
        code: "LB0003",
        params: { kind: "alias-cycle", name, alias: expanded.err.alias.name },
        span,
        document: loopbackErrorDocument({
          name,
          declaredType: type,
          explanation: ["It contains an alias that expands into itself."],
        }),
      }),
    );
  }

  if (expr === undefined) {
    if (!matchWritableStream(expanded.ok)) {
      incrementTraceCounter("loopback.failures.LB0001");
      return err(
        diagnosticFromCode({
          code: "LB0001",
          params: {
            kind: "writable-stream-shape",
            name,
            declaredType: showType(type),
          },
          span,
          document: loopbackErrorDocument({
            name,
            declaredType: type,
            explanation: WRITABLE_STREAM_EXPLANATION,
          }),
        }),
      );
    }
    incrementTraceCounter("loopback.mailbox");
    const declaration: LoopbackDeclaration<TExpr> = {
      kind: "mailbox-loopback",
      name,
      type,
    };
    return ok(declaration);
  }

  const promiseType = promiseTypeOf(expanded.ok);
  if (!promiseType) {
    incrementTraceCounter("loopback.failures.LB0002");
    return err(
      diagnosticFromCode({
        code: "LB0002",
        params: { kind: "promise-stream-shape", name, declaredType: showType(type) },
        span,
        document: loopbackErrorDocument({
          name,
          declaredType: type,
          explanation: PROMISE_STREAM_EXPLANATION,
        }),
      }),
    );
  }

  incrementTraceCounter("loopback.promise");
  const declaration: LoopbackDeclaration<TExpr> = {
    kind: "promise-loopback",
    name,
    promiseType,
    expr,
    originalType: type,
  };
  return ok(declaration);
};
