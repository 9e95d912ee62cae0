import { describe, expect, it } from "vitest";
import { checkInput, checkOutput } from "../check-wire.js";
import { formatDiagnostic, renderDocument } from "../../diagnostics/index.js";
import { fn, record } from "../../types/index.js";
import { int, list, string } from "../../__tests__/type-fixtures.js";

describe("wire error reports", () => {
  it("renders output errors with the output catalogue", () => {
    const outcome = checkOutput("sendUser", fn(fn(int, int), int));
    if (!("err" in outcome)) throw new Error("expected an output error");

    expect(outcome.err.document && renderDocument(outcome.err.document)).toBe(
      [
        "Output Error:",
        "    The output named 'sendUser' has an invalid type.",
        "",
        "        (Int -> Int) -> Int",
        "",
        "    It contains higher-order functions:",
        "",
        "        Int -> Int",
        "",
        "    Acceptable values for outputs include:",
        "      Ints, Floats, Bools, Strings, Maybes, Lists, Arrays, Tuples, unit values,",
        "      Json.Values, first-order functions, promises, and concrete records.",
      ].join("\n"),
    );
  });

  it("renders input errors without functions or promises in the catalogue", () => {
    const root = record({ name: string, onSave: list(fn(string, int)) });
    const outcome = checkInput("users", root);
    if (!("err" in outcome)) throw new Error("expected an input error");

    expect(outcome.err.document && renderDocument(outcome.err.document)).toBe(
      [
        "Input Error:",
        "    The input named 'users' has an invalid type.",
        "",
        "        { name : String, onSave : List (String -> Int) }",
        "",
        "    It contains functions:",
        "",
        "        String -> Int",
        "",
        "    Acceptable values for inputs include:",
        "      Ints, Floats, Bools, Strings, Maybes, Lists, Arrays, Tuples, unit values,",
        "      Json.Values, and concrete records.",
      ].join("\n"),
    );
  });

  it("formats the one-line summary with code and phase", () => {
    const outcome = checkInput("users", fn(string, int));
    if (!("err" in outcome)) throw new Error("expected an input error");

    expect(formatDiagnostic(outcome.err)).toBe(
      "<unknown>:0-0 ERROR [canonicalize] WR0003: the input named 'users' has an invalid type: it contains functions (String -> Int)",
    );
    expect(outcome.err.hints?.[0]?.message).toContain("Inputs carry data only");
  });
});
