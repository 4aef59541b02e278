/**
 * Plan command - show the emission schedule for a rate
 */

import { Command } from "commander";
import { computeSchedule } from "../../lib/rate/schedule.js";
import { DEFAULT_THROTTLE_OPTIONS } from "../../types/config.js";
import { RateSchedule } from "../../types/rate.js";
import { BytePaceError, ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseByteSize, parseDuration } from "../../utils/units.js";
import { PlanCommandOptions } from "../config/types.js";

export interface PlanResult {
  status: "success";
  rate: { count: number; durationMs: number };
  tickMs: number;
  schedule: RateSchedule;
}

export function planRate(options: PlanCommandOptions): PlanResult {
  const count = parseByteSize(options.rate);
  const durationMs = parseDuration(options.per);
  const tickMs =
    options.tick === undefined
      ? DEFAULT_THROTTLE_OPTIONS.tickMs
      : parseDuration(options.tick);

  return {
    status: "success",
    rate: { count, durationMs },
    tickMs,
    schedule: computeSchedule(count, durationMs, tickMs),
  };
}

/**
 * Create the 'plan' command
 */
export function createPlanCommand(): Command {
  return new Command("plan")
    .description("Print the quota schedule computed for a rate")
    .requiredOption("--rate <size>", "Bytes allowed per period (e.g. 64KB)")
    .option("--per <duration>", "Rate period", "1s")
    .option("--tick <duration>", "Canonical tick (default 100us)")
    .action((opts: PlanCommandOptions) => {
      try {
        console.log(JSON.stringify(planRate(opts), null, 2));
      } catch (error) {
        const wrapped =
          error instanceof BytePaceError
            ? error
            : new ConfigError("Plan failed", undefined, { cause: error });
        logger.error("Plan failed", { message: wrapped.message });
        console.error(JSON.stringify(wrapped.toResponse("plan"), null, 2));
        process.exit(1);
      }
    });
}
