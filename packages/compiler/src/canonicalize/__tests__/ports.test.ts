import { afterEach, describe, expect, it, vi } from "vitest";
import {
  canonicalizeWireDeclarations,
  type WireDeclaration,
} from "../ports.js";
import { TRACE_ENV } from "../../trace.js";
import { fn, named, record } from "../../types/index.js";
import {
  int,
  mailbox,
  result,
  stream,
  string,
  userRef,
} from "../../__tests__/type-fixtures.js";

type Expr = { callee: string };

const httpError = named(userRef("Error", "Http"));

describe("canonicalizeWireDeclarations", () => {
  it("collects a diagnostic per failing declaration and keeps going", () => {
    const declarations: WireDeclaration<Expr>[] = [
      { kind: "input", name: "onClick", type: fn(int, int) },
      { kind: "input", name: "clicks", type: stream(int) },
      { kind: "output", name: "render", type: fn(fn(int, int), int) },
      {
        kind: "loopback",
        name: "inbox",
        type: record({ mailbox: mailbox(string), stream: stream(string) }),
      },
      { kind: "loopback", name: "fetch", type: int, expr: { callee: "Http.get" } },
    ];

    const outcome = canonicalizeWireDeclarations({ moduleId: "Main", declarations });

    expect(outcome.moduleId).toBe("Main");
    expect(outcome.success).toBe(false);
    expect(outcome.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      "WR0003",
      "WR0004",
      "LB0002",
    ]);
    expect(outcome.loopbacks.map((declaration) => declaration.kind)).toEqual([
      "mailbox-loopback",
    ]);
  });

  it("returns the checked loopbacks of a valid module", () => {
    const expr = { callee: "Http.get" };
    const outcome = canonicalizeWireDeclarations<Expr>({
      moduleId: "Main",
      declarations: [
        { kind: "output", name: "title", type: string },
        {
          kind: "loopback",
          name: "responses",
          type: stream(result(httpError, string)),
          expr,
        },
      ],
    });

    expect(outcome.success).toBe(true);
    expect(outcome.diagnostics).toEqual([]);
    expect(outcome.loopbacks).toHaveLength(1);
    expect(outcome.loopbacks[0]).toMatchObject({
      kind: "promise-loopback",
      name: "responses",
      expr,
    });
  });

  it("attaches the span of each declaration to its diagnostic", () => {
    const span = { file: "src/Main.ports", start: 40, end: 62 };
    const outcome = canonicalizeWireDeclarations({
      moduleId: "Main",
      declarations: [{ kind: "input", name: "p", type: fn(int, int), span }],
    });
    expect(outcome.diagnostics[0]?.span).toEqual(span);
  });

  it("succeeds with no declarations", () => {
    expect(
      canonicalizeWireDeclarations({ moduleId: "Empty", declarations: [] }),
    ).toEqual({ moduleId: "Empty", loopbacks: [], diagnostics: [], success: true });
  });
});

describe("canonicalize tracing", () => {
  const previous = process.env[TRACE_ENV];

  afterEach(() => {
    vi.restoreAllMocks();
    if (previous === undefined) {
      delete process.env[TRACE_ENV];
    } else {
      process.env[TRACE_ENV] = previous;
    }
  });

  it("logs a summary with the counters of the run", () => {
    process.env[TRACE_ENV] = "1";
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);

    canonicalizeWireDeclarations({
      moduleId: "Main",
      declarations: [
        { kind: "input", name: "ok", type: int },
        { kind: "input", name: "bad", type: fn(int, int) },
      ],
    });

    expect(log).toHaveBeenCalledTimes(1);
    const line = String(log.mock.calls[0]?.[0]);
    const prefix = "[portcheck:canonicalize] ";
    expect(line.startsWith(prefix)).toBe(true);

    const summary: unknown = JSON.parse(line.slice(prefix.length));
    expect(summary).toMatchObject({
      moduleId: "Main",
      success: false,
      declarations: 2,
      diagnostics: 1,
      counters: {
        "canonicalize.declarations": 2,
        "wire.failures.WR0003": 1,
        "wire.input.checks": 2,
      },
    });
  });

  it("stays quiet when tracing is off", () => {
    delete process.env[TRACE_ENV];
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);

    canonicalizeWireDeclarations({
      moduleId: "Main",
      declarations: [{ kind: "input", name: "bad", type: fn(int, int) }],
    });

    expect(log).not.toHaveBeenCalled();
  });
});
