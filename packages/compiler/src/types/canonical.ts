export type TypeRef = {
  moduleId: string;
  name: string;
};

export const typeRefEquals = (a: TypeRef, b: TypeRef): boolean =>
  a.moduleId === b.moduleId && a.name === b.name;

export type CanonicalType =
  | NamedType
  | AppliedType
  | VariableType
  | FunctionType
  | RecordType
  | AliasedType;

/** A resolved type constructor used without arguments. */
export interface NamedType {
  kind: "named";
  ref: TypeRef;
}

export interface AppliedType {
  kind: "applied";
  constructor: CanonicalType;
  args: readonly CanonicalType[];
}

/** A free type variable left over from inference. */
export interface VariableType {
  kind: "variable";
  id: string;
}

/** Curried arrow: `a -> b -> c` is `function(a, function(b, c))`. */
export interface FunctionType {
  kind: "function";
  argType: CanonicalType;
  resultType: CanonicalType;
}

export interface RecordField {
  name: string;
  type: CanonicalType;
}

export interface RecordType {
  kind: "record";
  fields: readonly RecordField[];
  extension?: string;
}

export type AliasArgument = readonly [param: string, type: CanonicalType];

/**
 * A use of a type alias. `args` binds the alias parameters, `body` is the
 * alias definition before those parameters are substituted.
 */
export interface AliasedType {
  kind: "aliased";
  alias: TypeRef;
  args: readonly AliasArgument[];
  body: CanonicalType;
}

export const named = (ref: TypeRef): NamedType => ({ kind: "named", ref });

export const applied = (
  constructor: CanonicalType | TypeRef,
  args: readonly CanonicalType[],
): AppliedType => ({
  kind: "applied",
  constructor: "kind" in constructor ? constructor : named(constructor),
  args,
});

export const variable = (id: string): VariableType => ({ kind: "variable", id });

export const fn = (
  argType: CanonicalType,
  resultType: CanonicalType,
): FunctionType => ({ kind: "function", argType, resultType });

/** Builds `a -> b -> ... -> result` from its components. */
export const arrows = (
  first: CanonicalType,
  ...rest: readonly CanonicalType[]
): CanonicalType => {
  const [next, ...tail] = rest;
  return next ? fn(first, arrows(next, ...tail)) : first;
};

export const record = (
  fields: Readonly<Record<string, CanonicalType>> | readonly RecordField[],
  extension?: string,
): RecordType => ({
  kind: "record",
  fields: isFieldList(fields)
    ? fields
    : Object.entries(fields).map(([name, type]) => ({ name, type })),
  ...(extension === undefined ? {} : { extension }),
});

export const aliased = (
  alias: TypeRef,
  args: readonly AliasArgument[],
  body: CanonicalType,
): AliasedType => ({ kind: "aliased", alias, args, body });

const isFieldList = (
  fields: Readonly<Record<string, CanonicalType>> | readonly RecordField[],
): fields is readonly RecordField[] => Array.isArray(fields);

/**
 * Flattens a curried arrow into its argument types followed by the final
 * result type. Only the right spine is followed; aliases are left as is.
 */
export const collectArrowComponents = (
  type: CanonicalType,
): CanonicalType[] => {
  const components: CanonicalType[] = [];
  let current = type;
  while (current.kind === "function") {
    components.push(current.argType);
    current = current.resultType;
  }
  components.push(current);
  return components;
};
