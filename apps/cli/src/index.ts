export { runCli, exec, EXIT_OK, EXIT_CHECK_FAILED, EXIT_USAGE, type CliIo } from "./exec.js";
export { parseCliConfig } from "./config/arg-parser.js";
export type { PortcheckConfig } from "./config/types.js";
export { parseManifest, manifestSchema, canonicalTypeSchema, type PortManifest } from "./manifest.js";
export { formatCliDiagnostic } from "./diagnostics.js";
