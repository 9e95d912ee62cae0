import {
  type Diagnostic,
  DiagnosticEmitter,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { WireCheckOptions } from "../config.js";
import {
  diffTraceCounters,
  incrementTraceCounter,
  logCanonicalizeSummary,
  snapshotTraceCounters,
} from "../trace.js";
import type { CanonicalType } from "../types/index.js";
import { checkInput, checkOutput } from "../wire/check-wire.js";
import { loopback, type LoopbackDeclaration } from "../wire/loopback.js";

export type WireDeclaration<TExpr> =
  | { kind: "input"; name: string; type: CanonicalType; span?: SourceSpan }
  | { kind: "output"; name: string; type: CanonicalType; span?: SourceSpan }
  | {
      kind: "loopback";
      name: string;
      type: CanonicalType;
      expr?: TExpr;
      span?: SourceSpan;
    };

export type CanonicalizeWireOptions = Omit<WireCheckOptions, "span">;

export type CanonicalizeWireResult<TExpr> = {
  moduleId: string;
  loopbacks: LoopbackDeclaration<TExpr>[];
  diagnostics: readonly Diagnostic[];
  success: boolean;
};

/**
 * Checks every port and loopback of a module. Each declaration is checked
 * on its own, so one failing declaration does not hide the others; each
 * contributes at most one diagnostic.
 */
export const canonicalizeWireDeclarations = <TExpr>({
  moduleId,
  declarations,
  options = {},
}: {
  moduleId: string;
  declarations: readonly WireDeclaration<TExpr>[];
  options?: CanonicalizeWireOptions;
}): CanonicalizeWireResult<TExpr> => {
  const started = performance.now();
  const countersBefore = snapshotTraceCounters();
  const emitter = new DiagnosticEmitter();
  const loopbacks: LoopbackDeclaration<TExpr>[] = [];

  declarations.forEach((declaration) => {
    const checkOptions: WireCheckOptions = { ...options, span: declaration.span };
    incrementTraceCounter("canonicalize.declarations");

    switch (declaration.kind) {
      case "input": {
        const result = checkInput(declaration.name, declaration.type, checkOptions);
        if ("err" in result) emitter.report(result.err);
        return;
      }
      case "output": {
        const result = checkOutput(declaration.name, declaration.type, checkOptions);
        if ("err" in result) emitter.report(result.err);
        return;
      }
      case "loopback": {
        const result = loopback(
          declaration.name,
          declaration.expr,
          declaration.type,
          checkOptions,
        );
        if ("err" in result) {
          emitter.report(result.err);
          return;
        }
        loopbacks.push(result.ok);
        return;
      }
    }
    return exhaustive(declaration);
  });

  const success = !emitter.hasErrors;
  logCanonicalizeSummary({
    moduleId,
    success,
    declarations: declarations.length,
    diagnostics: emitter.diagnostics.length,
    durationMs: performance.now() - started,
    counters: diffTraceCounters({
      before: countersBefore,
      after: snapshotTraceCounters(),
    }),
  });

  return {
    moduleId,
    loopbacks,
    diagnostics: emitter.diagnostics,
    success,
  };
};

const exhaustive = (_value: never): never => _value;
