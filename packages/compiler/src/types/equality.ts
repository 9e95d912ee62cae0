import { type CanonicalType, typeRefEquals } from "./canonical.js";

/**
 * Structural equality. Record fields are matched by name regardless of
 * their order; aliases are equal only to aliases with the same name,
 * arguments and body.
 */
export const typesEqual = (a: CanonicalType, b: CanonicalType): boolean => {
  switch (a.kind) {
    case "named":
      return b.kind === "named" && typeRefEquals(a.ref, b.ref);
    case "variable":
      return b.kind === "variable" && a.id === b.id;
    case "applied":
      return (
        b.kind === "applied" &&
        typesEqual(a.constructor, b.constructor) &&
        allEqual(a.args, b.args)
      );
    case "function":
      return (
        b.kind === "function" &&
        typesEqual(a.argType, b.argType) &&
        typesEqual(a.resultType, b.resultType)
      );
    case "record": {
      if (b.kind !== "record") return false;
      if (a.extension !== b.extension) return false;
      if (a.fields.length !== b.fields.length) return false;
      return a.fields.every((field) => {
        const other = b.fields.find((candidate) => candidate.name === field.name);
        return other !== undefined && typesEqual(field.type, other.type);
      });
    }
    case "aliased":
      return (
        b.kind === "aliased" &&
        typeRefEquals(a.alias, b.alias) &&
        a.args.length === b.args.length &&
        a.args.every(([param, type], index) => {
          const other = b.args[index];
          return other !== undefined && other[0] === param && typesEqual(type, other[1]);
        }) &&
        typesEqual(a.body, b.body)
      );
  }
  return exhaustive(a);
};

const allEqual = (
  left: readonly CanonicalType[],
  right: readonly CanonicalType[],
): boolean =>
  left.length === right.length &&
  left.every((type, index) => {
    const other = right[index];
    return other !== undefined && typesEqual(type, other);
  });

const exhaustive = (_value: never): never => _value;
