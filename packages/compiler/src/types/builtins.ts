import {
  type CanonicalType,
  type TypeRef,
  typeRefEquals,
} from "./canonical.js";

const ref = (moduleId: string, name: string): TypeRef => ({ moduleId, name });

/**
 * Well-known constructor identities. A constructor is only treated as a
 * builtin when both its module and its name match, so user types that
 * shadow these names are ordinary types.
 */
export const BUILTINS = {
  int: ref("Basics", "Int"),
  float: ref("Basics", "Float"),
  bool: ref("Basics", "Bool"),
  char: ref("Char", "Char"),
  string: ref("String", "String"),
  jsonValue: ref("Json.Encode", "Value"),
  tuple: ref("Basics", "Tuple"),
  maybe: ref("Maybe", "Maybe"),
  array: ref("Array", "Array"),
  list: ref("List", "List"),
  stream: ref("Stream", "Stream"),
  varying: ref("Varying", "Varying"),
  mailbox: ref("Mailbox", "Mailbox"),
  result: ref("Result", "Result"),
  promise: ref("Promise", "Promise"),
} as const satisfies Record<string, TypeRef>;

const PRIMITIVES: readonly TypeRef[] = [
  BUILTINS.int,
  BUILTINS.float,
  BUILTINS.bool,
  BUILTINS.char,
  BUILTINS.string,
];

const is =
  (builtin: TypeRef) =>
  (candidate: TypeRef): boolean =>
    typeRefEquals(builtin, candidate);

export const isPrimitive = (candidate: TypeRef): boolean =>
  PRIMITIVES.some((primitive) => typeRefEquals(primitive, candidate));

export const isInt = is(BUILTINS.int);
export const isFloat = is(BUILTINS.float);
export const isBool = is(BUILTINS.bool);
export const isChar = is(BUILTINS.char);
export const isString = is(BUILTINS.string);
export const isJson = is(BUILTINS.jsonValue);
export const isTuple = is(BUILTINS.tuple);
export const isMaybe = is(BUILTINS.maybe);
export const isArray = is(BUILTINS.array);
export const isList = is(BUILTINS.list);
export const isStream = is(BUILTINS.stream);
export const isVarying = is(BUILTINS.varying);
export const isMailbox = is(BUILTINS.mailbox);
export const isResult = is(BUILTINS.result);
export const isPromise = is(BUILTINS.promise);

/** Returns the constructor identity when `type` is a bare named reference. */
export const namedRef = (type: CanonicalType): TypeRef | undefined =>
  type.kind === "named" ? type.ref : undefined;

/**
 * Matches `applied(named(ref), args)` where `ref` satisfies `predicate`
 * and, when given, exactly `arity` arguments are applied.
 */
export const matchApplied = (
  type: CanonicalType,
  predicate: (ref: TypeRef) => boolean,
  arity?: number,
): { ref: TypeRef; args: readonly CanonicalType[] } | undefined => {
  if (type.kind !== "applied") return undefined;
  const head = namedRef(type.constructor);
  if (!head || !predicate(head)) return undefined;
  if (arity !== undefined && type.args.length !== arity) return undefined;
  return { ref: head, args: type.args };
};
