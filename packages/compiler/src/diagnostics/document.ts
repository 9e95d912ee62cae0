/**
 * Minimal layout documents for multi-line diagnostics. A document is an
 * ordered tree of text blocks; `nest` indents everything below it.
 */
export type DiagnosticDocument =
  | { kind: "text"; text: string }
  | { kind: "nest"; indent: number; body: DiagnosticDocument }
  | { kind: "vcat"; blocks: readonly DiagnosticDocument[] };

/** A block of text. Embedded newlines start new lines at the same indent. */
export const text = (value: string): DiagnosticDocument => ({
  kind: "text",
  text: value,
});

export const nest = (
  indent: number,
  body: DiagnosticDocument,
): DiagnosticDocument => ({ kind: "nest", indent, body });

export const vcat = (
  blocks: readonly DiagnosticDocument[],
): DiagnosticDocument => ({ kind: "vcat", blocks });

export const documentLines = (
  document: DiagnosticDocument,
  indent = 0,
): string[] => {
  switch (document.kind) {
    case "text":
      return document.text
        .split("\n")
        .map((line) => (line.length > 0 ? `${" ".repeat(indent)}${line}` : ""));
    case "nest":
      return documentLines(document.body, indent + document.indent);
    case "vcat":
      return document.blocks.flatMap((block) => documentLines(block, indent));
  }
  return exhaustive(document);
};

export const renderDocument = (document: DiagnosticDocument): string =>
  documentLines(document).join("\n");

const exhaustive = (_value: never): never => _value;
