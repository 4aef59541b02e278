/**
 * CLI configuration types
 */

import { LogLevel } from "../../utils/logger.js";
import { ThrottleConfigSection } from "../../utils/config-loader.js";

/**
 * Complete configuration file structure
 */
export interface BytePaceConfig {
  logLevel?: LogLevel;
  pipe?: PipeConfig;
}

export interface PipeConfig extends ThrottleConfigSection {
  input?: string;
  output?: string;
}

/**
 * Options for the pipe command, as parsed by commander
 */
export interface PipeCommandOptions {
  rate?: string;
  per?: string;
  tick?: string;
  bufferSize?: string;
  minTimerInterval?: string;
  output?: string;
  config?: string;
}

export interface PlanCommandOptions {
  rate: string;
  per: string;
  tick?: string;
}
