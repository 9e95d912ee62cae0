import { Command, InvalidArgumentError } from "commander";
import { CLI_VERSION } from "../version.js";
import type { PortcheckConfig } from "./types.js";

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return parsed;
};

export type CliOutput = {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
};

const createCommand = (output?: CliOutput): Command => {
  const program = new Command()
    .name("portcheck")
    .description("Check that port and loopback declarations can cross the host boundary")
    .version(CLI_VERSION, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<manifest>", "JSON manifest of the module's declarations")
    .option("--no-color", "disable colored output")
    .option("--json", "print diagnostics and loopbacks as JSON")
    .option(
      "--max-alias-depth <n>",
      "nested alias expansions allowed before reporting an alias cycle",
      parsePositiveInt,
    )
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }
  return program;
};

/**
 * Parses CLI arguments (without the node and script entries). Invalid
 * arguments, `--help` and `--version` throw a `CommanderError`.
 */
export const parseCliConfig = (
  argv: readonly string[],
  output?: CliOutput,
): PortcheckConfig => {
  const program = createCommand(output);
  program.parse(["node", "portcheck", ...argv]);
  const opts = program.opts<{
    color: boolean;
    json?: boolean;
    maxAliasDepth?: number;
  }>();
  const [manifest] = program.args;

  return {
    manifest: manifest ?? "",
    color: opts.color,
    json: opts.json ?? false,
    maxAliasDepth: opts.maxAliasDepth,
  };
};

export const getConfigFromCli = (): PortcheckConfig =>
  parseCliConfig(process.argv.slice(2));
