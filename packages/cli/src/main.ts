/**
 * @histcost/cli — Entry point.
 *
 * Loads config, runs one trial balance and sets the exit code:
 * 0 balanced, 1 not balanced, 2 aborted.
 */

import pino from "pino";
import { loadConfig } from "./config.js";
import { runCli } from "./cli.js";

async function main(): Promise<void> {
  const config = loadConfig();
  // Logs go to stderr; stdout carries the summary.
  const logger = config.NODE_ENV === "development"
    ? pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    })
    : pino({ level: config.LOG_LEVEL }, pino.destination(2));

  process.exitCode = await runCli(config, logger);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(2);
});
