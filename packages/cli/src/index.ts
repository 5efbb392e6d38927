/**
 * @histcost/cli
 *
 * Command-line runner: environment configuration, input files,
 * console summary and JSON report.
 */

export { ConfigSchema, loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { CliError } from "./errors.js";
export type { CliErrorCode } from "./errors.js";
export { parseSecondaryLedger } from "./secondary-ledger.js";
export { loadRateSource, loadSecondaryLedger, readTextFile, writeJsonFile } from "./inputs.js";
export { exitCodeFor, renderSummary } from "./summary.js";
export type { RunStatus } from "./summary.js";
export { runCli } from "./cli.js";
export type { CliIo } from "./cli.js";
