import { readFile } from "node:fs/promises";
import { CommanderError } from "commander";
import {
  canonicalizeWireDeclarations,
  type CanonicalizeWireResult,
  type LoopbackDeclaration,
  renderDocument,
  showType,
} from "@portcheck/compiler";
import { parseCliConfig } from "./config/arg-parser.js";
import type { PortcheckConfig } from "./config/types.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { parseManifest } from "./manifest.js";

export const EXIT_OK = 0;
export const EXIT_CHECK_FAILED = 1;
export const EXIT_USAGE = 2;

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readFile: (path) => readFile(path, "utf8"),
};

const loopbackToJson = (declaration: LoopbackDeclaration<unknown>) =>
  declaration.kind === "mailbox-loopback"
    ? {
        kind: declaration.kind,
        name: declaration.name,
        type: showType(declaration.type),
      }
    : {
        kind: declaration.kind,
        name: declaration.name,
        promiseType: showType(declaration.promiseType),
        originalType: showType(declaration.originalType),
      };

const resultToJson = (result: CanonicalizeWireResult<unknown>) => ({
  module: result.moduleId,
  success: result.success,
  diagnostics: result.diagnostics.map((diagnostic) => ({
    code: diagnostic.code,
    severity: diagnostic.severity,
    phase: diagnostic.phase,
    message: diagnostic.message,
    span: diagnostic.span,
    hints: diagnostic.hints?.map((hint) => hint.message) ?? [],
    report: diagnostic.document ? renderDocument(diagnostic.document) : undefined,
  })),
  loopbacks: result.loopbacks.map(loopbackToJson),
});

const parseJson = (source: string): { value: unknown } | { error: string } => {
  try {
    return { value: JSON.parse(source) };
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }
};

const checkManifest = async (
  config: PortcheckConfig,
  io: CliIo,
): Promise<number> => {
  const source = await io.readFile(config.manifest);
  const json = parseJson(source);
  if ("error" in json) {
    io.stderr(`${config.manifest}: invalid JSON: ${json.error}`);
    return EXIT_USAGE;
  }

  const manifest = parseManifest(json.value);
  if ("err" in manifest) {
    io.stderr(`${config.manifest}: invalid manifest`);
    manifest.err.forEach((issue) => io.stderr(`  ${issue}`));
    return EXIT_USAGE;
  }

  const result = canonicalizeWireDeclarations({
    moduleId: manifest.ok.module,
    declarations: manifest.ok.declarations,
    options: { maxAliasDepth: config.maxAliasDepth },
  });

  if (config.json) {
    io.stdout(JSON.stringify(resultToJson(result), undefined, 2));
  } else {
    result.diagnostics.forEach((diagnostic) =>
      io.stderr(
        formatCliDiagnostic(diagnostic, {
          color: config.color,
          fallbackLocation: `${config.manifest} (${result.moduleId})`,
        }),
      ),
    );
  }

  return result.success ? EXIT_OK : EXIT_CHECK_FAILED;
};

/** Runs the CLI and resolves with the process exit code. */
export const runCli = async (
  argv: readonly string[],
  io: CliIo = defaultIo,
): Promise<number> => {
  let config: PortcheckConfig;
  try {
    config = parseCliConfig(argv, {
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }

  try {
    return await checkManifest(config, io);
  } catch (error) {
    io.stderr(
      `${config.manifest}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return EXIT_USAGE;
  }
};

export const exec = (): Promise<void> =>
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_USAGE;
    },
  );
