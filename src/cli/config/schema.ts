/**
 * JSON Schema for bytepace configuration files
 */

const sizeOrDuration = { type: ["string", "number"] };

export const configSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    logLevel: {
      type: "string",
      enum: ["error", "warn", "info", "debug"],
    },
    pipe: {
      type: "object",
      additionalProperties: false,
      properties: {
        input: { type: "string" },
        output: { type: "string" },
        rate: sizeOrDuration,
        per: sizeOrDuration,
        tick: sizeOrDuration,
        bufferSize: sizeOrDuration,
        minTimerInterval: sizeOrDuration,
      },
    },
  },
};
