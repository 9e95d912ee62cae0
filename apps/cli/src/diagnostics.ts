import {
  type Diagnostic,
  type DiagnosticSeverity,
  documentLines,
  type SourceSpan,
} from "@portcheck/compiler";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatLocation = ({
  span,
  fallback,
}: {
  span: SourceSpan;
  fallback?: string;
}): string =>
  span.file === "<unknown>" && fallback !== undefined
    ? fallback
    : `${span.file}:${span.start}-${span.end}`;

/**
 * Header line, the indented report and any hints. `fallbackLocation` names
 * the module when the declaration carries no source span.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; fallbackLocation?: string } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const location = formatLocation({
    span: diagnostic.span,
    fallback: options.fallbackLocation,
  });
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${color.severityLabel(
    diagnostic.severity
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const report = diagnostic.document
    ? documentLines(diagnostic.document, 2)
    : [];
  const hints = (diagnostic.hints ?? []).map((hint) =>
    color.muted(`  hint: ${hint.message}`)
  );

  return [header, ...report, ...hints].join("\n");
};
