import type { AgentConfig } from "../lib/config";
import { CheckError } from "../lib/errors";
import { logger } from "../lib/logger";
import { recordCheckRun } from "../lib/prometheus";
import { ElasticCheck } from "./elastic";
import type { Check, CheckOutcome } from "./types";

/**
 * Checks the agent runs, in registration order
 */
export function createChecks(): Check[] {
  return [new ElasticCheck()];
}

/**
 * Run one check and fold the result or failure into an outcome.
 * Never throws.
 */
export async function runCheck(
  check: Check,
  config: AgentConfig,
  groupId: number,
): Promise<CheckOutcome> {
  const name = check.name();
  const start = Date.now();

  try {
    logger.debug({ check: name, groupId }, "Running check");

    const messages = await check.run(config, groupId);
    const durationMs = Date.now() - start;
    recordCheckRun(name, "ok", durationMs);

    return {
      check: name,
      state: "ok",
      durationMs,
      messages,
      reason: "CHECK_OK",
      message: `Collected ${messages.length} messages`,
    };
  } catch (error) {
    const durationMs = Date.now() - start;
    recordCheckRun(name, "error", durationMs);
    logger.error({ check: name, groupId, error }, "Check run failed");

    if (error instanceof CheckError) {
      return {
        check: name,
        state: "error",
        durationMs,
        messages: [],
        reason: error.reason,
        message: error.message,
      };
    }

    return {
      check: name,
      state: "error",
      durationMs,
      messages: [],
      reason: "EXECUTION_ERROR",
      message: error instanceof Error && error.message ? error.message : "Unknown error",
    };
  }
}

export type { Check, CheckOutcome, MessageBody } from "./types";
export { ElasticCheck } from "./elastic";
