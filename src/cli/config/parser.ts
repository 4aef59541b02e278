/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { Ajv } from "ajv";
import { parse as parseYaml } from "yaml";
import { BytePaceConfig } from "./types.js";
import { configSchema } from "./schema.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateConfig = ajv.compile<BytePaceConfig>(configSchema);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): BytePaceConfig {
  logger.debug("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // An empty YAML document parses to null
  const config = parsed ?? {};
  if (!validateConfig(config)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      errors: (validateConfig.errors ?? []).map(
        (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
      ),
    });
  }

  logger.debug("Configuration file parsed successfully", {
    hasPipeConfig: !!config.pipe,
  });

  return config;
}
