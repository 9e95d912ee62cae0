import type { DiagnosticDocument } from "./document.js";

export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "canonicalize";

export type SourceSpan = {
  file: string;
  start: number;
  end: number;
};

export type DiagnosticHint = {
  message: string;
};

export type Diagnostic = {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
  /** Full multi-section report shown under the one-line message. */
  document?: DiagnosticDocument;
};

export type DiagnosticInput = Omit<Diagnostic, "severity" | "phase"> & {
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};
