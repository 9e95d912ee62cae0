import { afterEach, describe, expect, it } from "vitest";
import { MAX_ALIAS_DEPTH_ENV, resolveWireCheckOptions } from "../config.js";

describe("resolveWireCheckOptions", () => {
  const previous = process.env[MAX_ALIAS_DEPTH_ENV];

  afterEach(() => {
    if (previous === undefined) {
      delete process.env[MAX_ALIAS_DEPTH_ENV];
    } else {
      process.env[MAX_ALIAS_DEPTH_ENV] = previous;
    }
  });

  it("defaults the alias depth to 64", () => {
    delete process.env[MAX_ALIAS_DEPTH_ENV];
    expect(resolveWireCheckOptions()).toEqual({
      maxAliasDepth: 64,
      span: undefined,
    });
  });

  it("reads the alias depth from the environment", () => {
    process.env[MAX_ALIAS_DEPTH_ENV] = "5";
    expect(resolveWireCheckOptions().maxAliasDepth).toBe(5);
  });

  it.each(["abc", "0", "-3", "2.5"])(
    "ignores an unusable environment value %s",
    (value) => {
      process.env[MAX_ALIAS_DEPTH_ENV] = value;
      expect(resolveWireCheckOptions().maxAliasDepth).toBe(64);
    },
  );

  it("prefers an explicit option over the environment", () => {
    process.env[MAX_ALIAS_DEPTH_ENV] = "5";
    const span = { file: "src/Main.ports", start: 0, end: 4 };
    expect(resolveWireCheckOptions({ maxAliasDepth: 12, span })).toEqual({
      maxAliasDepth: 12,
      span,
    });
  });
});
