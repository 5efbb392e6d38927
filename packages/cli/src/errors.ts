/**
 * Errors raised while loading the run's input files.
 */

export type CliErrorCode =
  | "UNREADABLE_FILE"
  | "INVALID_RATES_FILE"
  | "INVALID_SECONDARY_LEDGER";

export class CliError extends Error {
  public readonly code: CliErrorCode;
  public readonly path: string | undefined;

  constructor(code: CliErrorCode, message: string, path?: string) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.path = path;
  }
}
