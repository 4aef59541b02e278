/**
 * Pipe command - copy an input to an output at a bounded rate
 */

import { Command } from "commander";
import { createReadStream, createWriteStream } from "fs";
import { Readable, Writable, pipeline } from "stream";
import { promisify } from "util";
import { performance } from "node:perf_hooks";
import { wrap } from "../../lib/throttle/throttled-stream.js";
import { createThrottledReadable } from "../../lib/throttle/throttled-readable.js";
import { RateSpec } from "../../types/config.js";
import { RateSchedule } from "../../types/rate.js";
import {
  ThrottleConfig,
  loadThrottleConfig,
} from "../../utils/config-loader.js";
import { BytePaceError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { formatByteSize } from "../../utils/units.js";
import { parseConfigFile } from "../config/parser.js";
import { PipeCommandOptions, PipeConfig } from "../config/types.js";

const pipelineAsync = promisify(pipeline);

export interface PipeRunOptions {
  /** File path, or "-" / undefined for stdin */
  input?: string;
  /** File path, or "-" / undefined for stdout */
  output?: string;
  config: ThrottleConfig;
}

export interface PipeMetrics {
  bytes: number;
  durationMs: number;
  bytesPerSec: number;
  schedule?: RateSchedule;
}

function openInput(path: string | undefined): Readable {
  return path === undefined || path === "-" ? process.stdin : createReadStream(path);
}

function openOutput(path: string | undefined): Writable {
  return path === undefined || path === "-" ? process.stdout : createWriteStream(path);
}

/**
 * Human-readable rate for log lines, e.g. "64KB per 1000ms"
 */
export function describeRate(rate: RateSpec | undefined): string {
  if (!rate) return "unthrottled";
  return `${formatByteSize(rate.count)} per ${rate.durationMs}ms`;
}

/**
 * Copy input to output through a throttled stream
 */
export async function runPipe(options: PipeRunOptions): Promise<PipeMetrics> {
  const { rate, options: throttleOptions } = options.config;
  const stream = wrap(openInput(options.input), throttleOptions);
  const schedule = rate ? stream.setRate(rate.count, rate.durationMs) : undefined;

  logger.info("Starting throttled copy", {
    input: options.input ?? "stdin",
    output: options.output ?? "stdout",
    rate: describeRate(rate),
    schedule,
  });

  const startTime = performance.now();
  try {
    await pipelineAsync(createThrottledReadable(stream), openOutput(options.output));
  } catch (error) {
    if (error instanceof BytePaceError) throw error;
    throw new FileIOError("Throttled copy failed", undefined, { cause: error });
  } finally {
    stream.close();
  }

  const durationMs = performance.now() - startTime;
  const metrics: PipeMetrics = {
    bytes: stream.bytesRead,
    durationMs: Math.round(durationMs),
    bytesPerSec:
      durationMs > 0 ? Math.round(stream.bytesRead / (durationMs / 1000)) : 0,
    schedule,
  };

  logger.info("Throttled copy complete", { ...metrics });
  return metrics;
}

/**
 * Create the 'pipe' command
 */
export function createPipeCommand(): Command {
  return new Command("pipe")
    .description("Copy a file or stdin to a file or stdout at a bounded rate")
    .argument("[input]", 'Input path (or "-" for stdin)')
    .option("-o, --output <path>", 'Output path (or "-" for stdout)')
    .option("--rate <size>", "Bytes allowed per period (e.g. 64KB)")
    .option("--per <duration>", "Rate period (e.g. 1s, 250ms)")
    .option("--tick <duration>", "Canonical tick (default 100us)")
    .option("--buffer-size <size>", "Internal staging buffer size (default 8KB)")
    .option(
      "--min-timer-interval <duration>",
      "Shortest emitter timer interval (default 1ms)",
    )
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(pipeAction);
}

async function pipeAction(
  input: string | undefined,
  opts: PipeCommandOptions,
  command: Command,
): Promise<void> {
  try {
    let fileConfig: PipeConfig = {};
    if (opts.config) {
      const parsed = parseConfigFile(opts.config);
      fileConfig = parsed.pipe ?? {};
      // --log-level on the command line wins over the file
      if (parsed.logLevel && command.parent?.opts().logLevel === undefined) {
        logger.setLevel(parsed.logLevel);
      }
    }

    const config = loadThrottleConfig(opts, fileConfig);
    await runPipe({
      input: input ?? fileConfig.input,
      output: opts.output ?? fileConfig.output,
      config,
    });
  } catch (error) {
    const wrapped =
      error instanceof BytePaceError
        ? error
        : new FileIOError("Pipe failed", undefined, { cause: error });
    logger.error("Pipe failed", { message: wrapped.message });
    console.error(JSON.stringify(wrapped.toResponse("pipe"), null, 2));
    process.exit(1);
  }
}
