#!/usr/bin/env node

/**
 * bytepace CLI - bandwidth shaping for byte streams
 */

import { Command } from "commander";
import { createPipeCommand } from "./commands/pipe.js";
import { createPlanCommand } from "./commands/plan.js";
import { isLogLevel, logger } from "../utils/logger.js";
import { toError } from "../utils/errors.js";

const pkg = {
  name: "bytepace",
  version: "0.1.0",
  description: "Smooth, externally controllable bandwidth shaping for byte streams",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .hook("preAction", (command) => {
      const level: unknown = command.opts().logLevel;
      if (isLogLevel(level)) logger.setLevel(level);
    });

  program.addCommand(createPipeCommand());
  program.addCommand(createPlanCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const { message } = toError(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
