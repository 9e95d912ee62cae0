import { err, ok, type Result } from "../result.js";
import type {
  AliasArgument,
  AliasedType,
  CanonicalType,
  TypeRef,
} from "./canonical.js";

export const DEFAULT_MAX_ALIAS_DEPTH = 64;

/** Raised when expanding nested aliases goes deeper than allowed. */
export type AliasCycle = {
  kind: "alias-cycle";
  alias: TypeRef;
  depth: number;
};

const aliasCycle = (alias: TypeRef, depth: number): AliasCycle => ({
  kind: "alias-cycle",
  alias,
  depth,
});

/**
 * Substitutes alias parameters in `body`. Nested alias bodies are left
 * untouched: their variables are bound by their own arguments, which are
 * substituted instead.
 */
export const dealias = (
  args: readonly AliasArgument[],
  body: CanonicalType,
): CanonicalType => {
  if (args.length === 0) return body;
  const bindings = new Map(args);
  const substitute = (type: CanonicalType): CanonicalType => {
    switch (type.kind) {
      case "variable":
        return bindings.get(type.id) ?? type;
      case "named":
        return type;
      case "applied":
        return {
          kind: "applied",
          constructor: substitute(type.constructor),
          args: type.args.map(substitute),
        };
      case "function":
        return {
          kind: "function",
          argType: substitute(type.argType),
          resultType: substitute(type.resultType),
        };
      case "record":
        return {
          ...type,
          fields: type.fields.map((field) => ({
            name: field.name,
            type: substitute(field.type),
          })),
        };
      case "aliased":
        return {
          ...type,
          args: type.args.map(([param, arg]) => [param, substitute(arg)] as const),
        };
    }
    return exhaustive(type);
  };
  return substitute(body);
};

export const expandAlias = (type: AliasedType): CanonicalType =>
  dealias(type.args, type.body);

/**
 * Expands aliases at the head of `type` until a non-alias is reached.
 * `depth` counts expansions already made on the current path.
 */
export const expandHead = (
  type: CanonicalType,
  { depth = 0, maxDepth = DEFAULT_MAX_ALIAS_DEPTH }: { depth?: number; maxDepth?: number } = {},
): Result<AliasCycle, { type: CanonicalType; depth: number }> => {
  let current = type;
  let currentDepth = depth;
  while (current.kind === "aliased") {
    if (currentDepth >= maxDepth) {
      return err(aliasCycle(current.alias, currentDepth));
    }
    current = expandAlias(current);
    currentDepth += 1;
  }
  return ok({ type: current, depth: currentDepth });
};

/** Removes every alias from `type`, at any depth. */
export const deepDealias = (
  type: CanonicalType,
  { maxDepth = DEFAULT_MAX_ALIAS_DEPTH }: { maxDepth?: number } = {},
): Result<AliasCycle, CanonicalType> => {
  const visit = (
    node: CanonicalType,
    depth: number,
  ): Result<AliasCycle, CanonicalType> => {
    switch (node.kind) {
      case "aliased": {
        if (depth >= maxDepth) {
          return err(aliasCycle(node.alias, depth));
        }
        return visit(expandAlias(node), depth + 1);
      }
      case "named":
      case "variable":
        return ok(node);
      case "applied": {
        const constructor = visit(node.constructor, depth);
        if ("err" in constructor) return constructor;
        const args = visitAll(node.args, depth);
        if ("err" in args) return args;
        const expanded: CanonicalType = {
          kind: "applied",
          constructor: constructor.ok,
          args: args.ok,
        };
        return ok(expanded);
      }
      case "function": {
        const argType = visit(node.argType, depth);
        if ("err" in argType) return argType;
        const resultType = visit(node.resultType, depth);
        if ("err" in resultType) return resultType;
        const expanded: CanonicalType = {
          kind: "function",
          argType: argType.ok,
          resultType: resultType.ok,
        };
        return ok(expanded);
      }
      case "record": {
        const types = visitAll(
          node.fields.map((field) => field.type),
          depth,
        );
        if ("err" in types) return types;
        const expanded: CanonicalType = {
          ...node,
          fields: node.fields.map((field, index) => ({
            name: field.name,
            type: types.ok[index] ?? field.type,
          })),
        };
        return ok(expanded);
      }
    }
    return exhaustive(node);
  };

  const visitAll = (
    nodes: readonly CanonicalType[],
    depth: number,
  ): Result<AliasCycle, CanonicalType[]> => {
    const expanded: CanonicalType[] = [];
    for (const node of nodes) {
      const result = visit(node, depth);
      if ("err" in result) return result;
      expanded.push(result.ok);
    }
    return ok(expanded);
  };

  return visit(type, 0);
};

const exhaustive = (_value: never): never => _value;
