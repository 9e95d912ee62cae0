import { isTuple, namedRef } from "./builtins.js";
import type { CanonicalType } from "./canonical.js";

/**
 * Renders a type in surface syntax, e.g. `Stream (Result Http.Error String)`
 * or `{ r | count : Int }`.
 */
export const showType = (type: CanonicalType): string => {
  switch (type.kind) {
    case "named":
      return isTuple(type.ref) ? "()" : type.ref.name;
    case "variable":
      return type.id;
    case "function":
      return `${showArrowArgument(type.argType)} -> ${showType(type.resultType)}`;
    case "record":
      return showRecord(type);
    case "aliased":
      return showConstructorApplication(
        type.alias.name,
        type.args.map(([, arg]) => arg),
      );
    case "applied": {
      const head = namedRef(type.constructor);
      if (head && isTuple(head)) {
        return `(${type.args.map(showType).join(", ")})`;
      }
      return showConstructorApplication(
        showApplicationHead(type.constructor),
        type.args,
      );
    }
  }
  return exhaustive(type);
};

const showConstructorApplication = (
  head: string,
  args: readonly CanonicalType[],
): string =>
  args.length === 0
    ? head
    : [head, ...args.map(showApplicationArgument)].join(" ");

const showApplicationHead = (type: CanonicalType): string =>
  type.kind === "named" || type.kind === "variable"
    ? showType(type)
    : `(${showType(type)})`;

const showApplicationArgument = (type: CanonicalType): string =>
  needsParensAsArgument(type) ? `(${showType(type)})` : showType(type);

const showArrowArgument = (type: CanonicalType): string =>
  type.kind === "function" ? `(${showType(type)})` : showType(type);

const needsParensAsArgument = (type: CanonicalType): boolean => {
  switch (type.kind) {
    case "function":
      return true;
    case "aliased":
      return type.args.length > 0;
    case "applied": {
      const head = namedRef(type.constructor);
      if (head && isTuple(head)) return false;
      return type.args.length > 0;
    }
    default:
      return false;
  }
};

const showRecord = (
  type: Extract<CanonicalType, { kind: "record" }>,
): string => {
  const fields = type.fields
    .map((field) => `${field.name} : ${showType(field.type)}`)
    .join(", ");
  if (type.extension !== undefined) {
    return fields.length > 0
      ? `{ ${type.extension} | ${fields} }`
      : `{ ${type.extension} | }`;
  }
  return fields.length > 0 ? `{ ${fields} }` : "{}";
};

const exhaustive = (_value: never): never => _value;
