import { decode, encode } from "@msgpack/msgpack";
import {
  type CanonicalType,
  DEFAULT_MAX_ALIAS_DEPTH,
  expandAlias,
  expandHead,
  isArray,
  isBool,
  isChar,
  isFloat,
  isInt,
  isJson,
  isList,
  isMaybe,
  isStream,
  isString,
  isTuple,
  isVarying,
  matchApplied,
  namedRef,
  showType,
  type TypeRef,
} from "../types/index.js";

const MSGPACK_OPTS = { useBigInt64: true } as const;

/** A host value that does not fit the port type it was sent through. */
export class PortValueError extends Error {
  readonly path: string;
  readonly expected: string;

  constructor({
    path,
    expected,
    message,
    cause,
  }: {
    path: string;
    expected: string;
    message: string;
    cause?: unknown;
  }) {
    super(`${path}: ${message}`, cause === undefined ? undefined : { cause });
    this.name = "PortValueError";
    this.path = path;
    this.expected = expected;
  }
}

type Walk = {
  path: string;
  aliasDepth: number;
};

const describe = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array of length ${value.length}`;
  return typeof value;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !ArrayBuffer.isView(value);

const mismatch = (walk: Walk, type: CanonicalType, value: unknown): never => {
  const expected = showType(type);
  throw new PortValueError({
    path: walk.path,
    expected,
    message: `expected ${expected}, got ${describe(value)}`,
  });
};

const unsupported = (walk: Walk, type: CanonicalType): never => {
  const expected = showType(type);
  throw new PortValueError({
    path: walk.path,
    expected,
    message: `${expected} cannot cross the host boundary`,
  });
};

const checkPrimitive = (
  walk: Walk,
  type: CanonicalType,
  ref: TypeRef,
  value: unknown,
): void => {
  if (isInt(ref)) {
    if (typeof value === "bigint") return;
    if (typeof value === "number" && Number.isSafeInteger(value)) return;
    return mismatch(walk, type, value);
  }
  if (isFloat(ref)) {
    if (typeof value === "number") return;
    return mismatch(walk, type, value);
  }
  if (isBool(ref)) {
    if (typeof value === "boolean") return;
    return mismatch(walk, type, value);
  }
  if (isChar(ref)) {
    if (typeof value === "string" && Array.from(value).length === 1) return;
    return mismatch(walk, type, value);
  }
  if (isString(ref)) {
    if (typeof value === "string") return;
    return mismatch(walk, type, value);
  }
  if (isJson(ref)) {
    if (value !== undefined && typeof value !== "function" && typeof value !== "symbol") {
      return;
    }
    return mismatch(walk, type, value);
  }
  if (isTuple(ref)) {
    if (value === null) return;
    return mismatch(walk, type, value);
  }
  return unsupported(walk, type);
};

const checkElements = (
  walk: Walk,
  elementTypes: (index: number) => CanonicalType,
  values: readonly unknown[],
): void => {
  values.forEach((element, index) => {
    checkValue(
      { ...walk, path: `${walk.path}[${index}]` },
      elementTypes(index),
      element,
    );
  });
};

const checkApplied = (
  walk: Walk,
  type: Extract<CanonicalType, { kind: "applied" }>,
  value: unknown,
): void => {
  if (type.args.length === 0) {
    return checkValue(walk, type.constructor, value);
  }

  const head = namedRef(type.constructor);
  const [only] = type.args;
  if (head && only && type.args.length === 1) {
    if (isMaybe(head)) {
      if (value === null) return;
      return checkValue(walk, only, value);
    }
    if (isList(head) || isArray(head)) {
      if (!Array.isArray(value)) return mismatch(walk, type, value);
      return checkElements(walk, () => only, value);
    }
  }

  if (head && isTuple(head)) {
    if (!Array.isArray(value) || value.length !== type.args.length) {
      return mismatch(walk, type, value);
    }
    const args = type.args;
    return checkElements(walk, (index) => args[index] ?? type, value);
  }

  return unsupported(walk, type);
};

const checkRecord = (
  walk: Walk,
  type: Extract<CanonicalType, { kind: "record" }>,
  value: unknown,
): void => {
  if (type.extension !== undefined) return unsupported(walk, type);
  if (!isPlainObject(value)) return mismatch(walk, type, value);

  for (const field of type.fields) {
    const fieldPath = `${walk.path}.${field.name}`;
    if (!Object.prototype.hasOwnProperty.call(value, field.name)) {
      throw new PortValueError({
        path: fieldPath,
        expected: showType(field.type),
        message: `missing field ${field.name}`,
      });
    }
    checkValue({ ...walk, path: fieldPath }, field.type, value[field.name]);
  }

  const known = new Set(type.fields.map((field) => field.name));
  const extra = Object.keys(value).find((key) => !known.has(key));
  if (extra !== undefined) {
    throw new PortValueError({
      path: `${walk.path}.${extra}`,
      expected: showType(type),
      message: `unexpected field ${extra}`,
    });
  }
};

const checkValue = (walk: Walk, type: CanonicalType, value: unknown): void => {
  switch (type.kind) {
    case "aliased":
      if (walk.aliasDepth >= DEFAULT_MAX_ALIAS_DEPTH) {
        return unsupported(walk, type);
      }
      return checkValue(
        { ...walk, aliasDepth: walk.aliasDepth + 1 },
        expandAlias(type),
        value,
      );
    case "named":
      return checkPrimitive(walk, type, type.ref, value);
    case "applied":
      return checkApplied(walk, type, value);
    case "record":
      return checkRecord(walk, type, value);
    case "variable":
    case "function":
      return unsupported(walk, type);
  }
  return exhaustive(type);
};

/** The payload type of a port: one event of a Stream, one value of a Varying. */
const payloadType = (type: CanonicalType): CanonicalType => {
  const head = expandHead(type);
  if ("err" in head) {
    return unsupported({ path: "$", aliasDepth: 0 }, type);
  }
  const signal =
    matchApplied(head.ok.type, isStream, 1) ??
    matchApplied(head.ok.type, isVarying, 1);
  return signal?.args[0] ?? head.ok.type;
};

/**
 * Throws a {@link PortValueError} unless `value` fits the payload of a port
 * declared with `type`.
 */
export const assertPortValue = ({
  type,
  value,
}: {
  type: CanonicalType;
  value: unknown;
}): void => checkValue({ path: "$", aliasDepth: 0 }, payloadType(type), value);

export const encodePortValue = ({
  type,
  value,
}: {
  type: CanonicalType;
  value: unknown;
}): Uint8Array => {
  assertPortValue({ type, value });
  try {
    return encode(value, MSGPACK_OPTS);
  } catch (error) {
    throw new PortValueError({
      path: "$",
      expected: showType(type),
      message: `unable to encode value: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }
};

export const decodePortValue = ({
  type,
  bytes,
}: {
  type: CanonicalType;
  bytes: Uint8Array;
}): unknown => {
  if (bytes.byteLength === 0) {
    throw new PortValueError({
      path: "$",
      expected: showType(type),
      message: "no msgpack payload to decode",
    });
  }
  const value = decode(bytes, MSGPACK_OPTS);
  assertPortValue({ type, value });
  return value;
};

const exhaustive = (_value: never): never => _value;
