#!/usr/bin/env node
/**
 * One-shot check runner
 *
 * Usage:
 *   cluster-agent-check --check elastic [--group 1]
 */

import { parseArgs } from "node:util";
import { createChecks, runCheck } from "../checkers";
import { validateConfig } from "../lib/config";
import { logger } from "../lib/logger";
import { collectSystemInfo } from "../lib/system-info";

/**
 * Exit codes: 0 = ok, 1 = check failed, 2 = usage or fatal error
 */
async function main(): Promise<number> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      check: { type: "string" },
      group: { type: "string", default: "1" },
    },
  });

  const name = values.check;
  if (!name) {
    logger.error("Missing --check argument");
    return 2;
  }

  const groupId = Number.parseInt(values.group ?? "1", 10);
  if (!Number.isInteger(groupId) || groupId < 0) {
    logger.error({ group: values.group }, "Invalid --group argument");
    return 2;
  }

  const check = createChecks().find((c) => c.name() === name);
  if (!check) {
    logger.error({ check: name }, "Unknown check");
    return 2;
  }

  const config = validateConfig();
  await check.init(config, collectSystemInfo());

  try {
    const outcome = await runCheck(check, config, groupId);
    logger.info(
      { check: outcome.check, reason: outcome.reason, durationMs: outcome.durationMs },
      `Check result: ${outcome.state}`,
    );
    return outcome.state === "ok" ? 0 : 1;
  } finally {
    if (check.close) {
      await check.close();
    }
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    logger.error(error, "Fatal error");
    process.exit(2);
  });
