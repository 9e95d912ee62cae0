import { encode } from "@msgpack/msgpack";
import { describe, expect, it } from "vitest";
import {
  assertPortValue,
  decodePortValue,
  encodePortValue,
  PortValueError,
} from "../codec.js";
import { aliased, fn, record, variable } from "../../types/index.js";
import {
  bool,
  char,
  float,
  int,
  json,
  list,
  maybe,
  stream,
  string,
  tuple,
  unitType,
  userRef,
  varying,
} from "../../__tests__/type-fixtures.js";

const user = record({
  name: string,
  age: int,
  nickname: maybe(string),
  tags: list(string),
});

const catchPortValueError = (run: () => unknown): PortValueError => {
  try {
    run();
  } catch (error) {
    if (error instanceof PortValueError) return error;
    throw error;
  }
  throw new Error("expected a PortValueError");
};

describe("port value codec", () => {
  it("carries a record value through msgpack", () => {
    const value = { name: "Ada", age: 36, nickname: null, tags: ["math"] };
    const bytes = encodePortValue({ type: user, value });
    expect(decodePortValue({ type: user, bytes })).toEqual(value);
  });

  it("sends one event of a stream and one value of a varying", () => {
    const clicks = stream(tuple(int, int));
    expect(
      decodePortValue({ type: clicks, bytes: encodePortValue({ type: clicks, value: [3, 4] }) }),
    ).toEqual([3, 4]);
    expect(() => assertPortValue({ type: varying(bool), value: true })).not.toThrow();
  });

  it("accepts primitives, unit and json values", () => {
    expect(() => assertPortValue({ type: float, value: 1.5 })).not.toThrow();
    expect(() => assertPortValue({ type: char, value: "\u00e9" })).not.toThrow();
    expect(() => assertPortValue({ type: unitType, value: null })).not.toThrow();
    expect(() =>
      assertPortValue({ type: json, value: { nested: [1, "two", null] } }),
    ).not.toThrow();
  });

  it("keeps 64-bit integers as bigint", () => {
    const large = 2n ** 40n;
    const bytes = encodePortValue({ type: int, value: large });
    expect(decodePortValue({ type: int, bytes })).toBe(large);
  });

  it("carries integers beyond the float range without losing precision", () => {
    const large = 2n ** 60n + 1n;
    const bytes = encodePortValue({ type: list(int), value: [large, -large] });
    expect(decodePortValue({ type: list(int), bytes })).toEqual([large, -large]);
  });

  it("expands aliases while checking values", () => {
    const userId = aliased(userRef("UserId"), [], int);
    expect(() => assertPortValue({ type: list(userId), value: [1, 2] })).not.toThrow();
  });

  it("reports primitive mismatches at the failing path", () => {
    const error = catchPortValueError(() =>
      encodePortValue({ type: int, value: 1.5 }),
    );
    expect(error.message).toBe("$: expected Int, got number");
    expect(error.path).toBe("$");
    expect(error.expected).toBe("Int");
  });

  it("reports missing and unexpected record fields", () => {
    const missing = catchPortValueError(() =>
      assertPortValue({ type: user, value: { name: "Ada", nickname: null, tags: [] } }),
    );
    expect(missing.message).toBe("$.age: missing field age");

    const extra = catchPortValueError(() =>
      assertPortValue({
        type: user,
        value: { name: "Ada", age: 36, nickname: null, tags: [], admin: true },
      }),
    );
    expect(extra.message).toBe("$.admin: unexpected field admin");
  });

  it("reports the index of a failing element", () => {
    const error = catchPortValueError(() =>
      assertPortValue({ type: user, value: { name: "Ada", age: 36, nickname: null, tags: ["a", 2] } }),
    );
    expect(error.path).toBe("$.tags[1]");
    expect(error.message).toBe("$.tags[1]: expected String, got number");
  });

  it("checks tuple arity", () => {
    const error = catchPortValueError(() =>
      assertPortValue({ type: tuple(int, string), value: [1] }),
    );
    expect(error.message).toBe("$: expected (Int, String), got array of length 1");
  });

  it("refuses types that cannot cross the boundary", () => {
    expect(
      catchPortValueError(() =>
        encodePortValue({ type: fn(int, int), value: () => 1 }),
      ).message,
    ).toBe("$: Int -> Int cannot cross the host boundary");
    expect(
      catchPortValueError(() =>
        assertPortValue({ type: record({ x: int }, "r"), value: { x: 1 } }),
      ).message,
    ).toBe("$: { r | x : Int } cannot cross the host boundary");
    expect(
      catchPortValueError(() => assertPortValue({ type: variable("a"), value: 1 }))
        .message,
    ).toBe("$: a cannot cross the host boundary");
  });

  it("validates decoded payloads", () => {
    const bytes = encode({ a: 1 });
    expect(
      catchPortValueError(() => decodePortValue({ type: int, bytes })).message,
    ).toBe("$: expected Int, got object");
    expect(
      catchPortValueError(() =>
        decodePortValue({ type: int, bytes: new Uint8Array() }),
      ).message,
    ).toBe("$: no msgpack payload to decode");
  });
});
