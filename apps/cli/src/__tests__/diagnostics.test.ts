import {
  checkInput,
  type Diagnostic,
  diagnosticFromCode,
  fn,
  named,
  BUILTINS,
} from "@portcheck/compiler";
import { describe, expect, it } from "vitest";
import { formatCliDiagnostic } from "../diagnostics.js";

const int = named(BUILTINS.int);

const clicksDiagnostic = (options: Parameters<typeof checkInput>[2] = {}): Diagnostic => {
  const outcome = checkInput("clicks", fn(int, int), options);
  if (!("err" in outcome)) throw new Error("expected an input error");
  return outcome.err;
};

describe("formatCliDiagnostic", () => {
  it("renders the header, the indented report and the hints", () => {
    const formatted = formatCliDiagnostic(clicksDiagnostic(), {
      color: false,
      fallbackLocation: "main.json (Main)",
    });

    expect(formatted.split("\n")).toEqual([
      "main.json (Main) ERROR [canonicalize] WR0003: the input named 'clicks' has an invalid type: it contains functions (Int -> Int)",
      "  Input Error:",
      "      The input named 'clicks' has an invalid type.",
      "",
      "          Int -> Int",
      "",
      "      It contains functions:",
      "",
      "          Int -> Int",
      "",
      "      Acceptable values for inputs include:",
      "        Ints, Floats, Bools, Strings, Maybes, Lists, Arrays, Tuples, unit values,",
      "        Json.Values, and concrete records.",
      "  hint: Inputs carry data only. Send a value and pick the behavior on the managed side.",
    ]);
  });

  it("prefers the declaration span over the fallback location", () => {
    const diagnostic = clicksDiagnostic({
      span: { file: "src/Main.ports", start: 12, end: 30 },
    });
    const [header] = formatCliDiagnostic(diagnostic, {
      color: false,
      fallbackLocation: "main.json (Main)",
    }).split("\n");

    expect(header).toBe(
      "src/Main.ports:12-30 ERROR [canonicalize] WR0003: the input named 'clicks' has an invalid type: it contains functions (Int -> Int)",
    );
  });

  it("colors the severity and the code", () => {
    const [header] = formatCliDiagnostic(clicksDiagnostic(), {
      fallbackLocation: "main.json (Main)",
    }).split("\n");

    expect(header).toBe(
      "main.json (Main) \u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m [canonicalize] \u001B[35mWR0003\u001B[0m: the input named 'clicks' has an invalid type: it contains functions (Int -> Int)",
    );
  });

  it("prints only the header for diagnostics without a report", () => {
    const diagnostic = diagnosticFromCode({
      code: "WR0001",
      params: {
        kind: "unsupported-type",
        direction: "output",
        name: "user",
        rootType: "User",
        offendingType: "User",
      },
      severity: "warning",
    });

    expect(formatCliDiagnostic(diagnostic, { color: false })).toBe(
      "<unknown>:0-0 WARNING [canonicalize] WR0001: the output named 'user' has an invalid type: it contains an unsupported type (User)",
    );
  });
});
