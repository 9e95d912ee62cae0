import {
  type DiagnosticDocument,
  nest,
  text,
  vcat,
} from "../diagnostics/index.js";
import type { WireDirection } from "../diagnostics/index.js";
import type { CanonicalType } from "../types/index.js";
import { showType } from "../types/index.js";

const byDirection = (
  direction: WireDirection,
  input: string,
  output: string,
): string => (direction === "input" ? input : output);

const capitalized = (direction: WireDirection): string =>
  byDirection(direction, "Input", "Output");

/**
 * Report for a port whose type cannot cross the host boundary: the root
 * type, the failing subtype and the shapes that are accepted.
 */
export const wireErrorDocument = ({
  direction,
  name,
  rootType,
  offendingType,
  reason,
}: {
  direction: WireDirection;
  name: string;
  rootType: CanonicalType;
  offendingType: CanonicalType;
  reason: string;
}): DiagnosticDocument =>
  vcat([
    text(`${capitalized(direction)} Error:`),
    nest(
      4,
      vcat([
        text(`The ${direction} named '${name}' has an invalid type.\n`),
        nest(4, text(`${showType(rootType)}\n`)),
        text(`${reason}:\n`),
        nest(4, text(`${showType(offendingType)}\n`)),
        text(`Acceptable values for ${direction}s include:`),
        text(
          "  Ints, Floats, Bools, Strings, Maybes, Lists, Arrays, Tuples, unit values,",
        ),
        text(
          `  Json.Values, ${byDirection(direction, "", "first-order functions, promises, ")}and concrete records.`,
        ),
      ]),
    ),
  ]);

export const loopbackErrorDocument = ({
  name,
  declaredType,
  explanation,
}: {
  name: string;
  declaredType: CanonicalType;
  explanation: readonly string[];
}): DiagnosticDocument =>
  vcat([
    text("Loopback Error:"),
    nest(
      4,
      vcat([
        text(`The loopback named '${name}' has an invalid type.\n`),
        nest(4, text(`${showType(declaredType)}\n`)),
        ...explanation.map(text),
      ]),
    ),
  ]);
