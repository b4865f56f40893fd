import { pino } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "combo-registry"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export interface InstructionLogContext {
  readonly requestId: string;
  readonly signer: string;
  readonly instruction: string;
}

/**
 * Returns a child logger with instruction context attached.
 */
export function getInstructionLogger(context: InstructionLogContext) {
  return logger.child({
    requestId: context.requestId,
    signer: context.signer,
    instruction: context.instruction
  });
}
