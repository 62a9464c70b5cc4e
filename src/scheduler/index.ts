import { runCheck } from "../checkers";
import type { Check, CheckOutcome } from "../checkers/types";
import type { AgentConfig } from "../lib/config";
import { logger } from "../lib/logger";
import { calculateJitter } from "./jitter";

export interface SchedulerOptions {
  intervalSeconds: number;
  jitterPercent: number;
  includeRealTime?: boolean;
}

/**
 * Periodically runs the registered checks.
 * Ticks never overlap: the next one is armed after the previous finishes.
 */
export function createScheduler(checks: Check[], config: AgentConfig, options: SchedulerOptions) {
  const eligible = checks.filter((check) => options.includeRealTime || !check.realTime());
  const intervalMs = options.intervalSeconds * 1000;

  let groupId = 0;
  let timer: NodeJS.Timeout | null = null;
  let running = false;

  async function tick(): Promise<CheckOutcome[]> {
    groupId++;
    const outcomes: CheckOutcome[] = [];

    for (const check of eligible) {
      outcomes.push(await runCheck(check, config, groupId));
    }

    logger.debug(
      { groupId, checks: outcomes.length, failed: outcomes.filter((o) => o.state === "error").length },
      "Scheduler tick complete",
    );

    return outcomes;
  }

  function arm(delayMs: number): void {
    timer = setTimeout(() => {
      tick()
        .catch((error) => {
          logger.error({ error }, "Scheduler tick failed");
        })
        .finally(() => {
          if (running) arm(intervalMs);
        });
    }, delayMs);
  }

  return {
    tick,

    start(): void {
      if (running) return;
      running = true;

      const first = eligible[0];
      const jitterMs = first
        ? calculateJitter(first.name(), options.jitterPercent, options.intervalSeconds)
        : 0;

      logger.info(
        { checks: eligible.map((c) => c.name()), intervalSeconds: options.intervalSeconds, jitterMs },
        "Scheduler started",
      );
      arm(jitterMs);
    },

    stop(): void {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      logger.info("Scheduler stopped");
    },

    isRunning(): boolean {
      return running;
    },
  };
}

export type Scheduler = ReturnType<typeof createScheduler>;
export { calculateJitter } from "./jitter";
