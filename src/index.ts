/**
 * Search cluster agent entry point
 *
 * Initializes the registered checks, runs them on a fixed interval and
 * serves Prometheus metrics and check status over HTTP.
 */

import { createChecks, ElasticCheck } from "./checkers";
import type { Check } from "./checkers/types";
import { validateConfig } from "./lib/config";
import { logger } from "./lib/logger";
import { collectSystemInfo } from "./lib/system-info";
import { createScheduler, type Scheduler } from "./scheduler";
import { createMetricsServer, type MetricsServer } from "./server/metrics-server";

let metricsServer: MetricsServer | null = null;
let scheduler: Scheduler | null = null;
let checks: Check[] = [];
let ready = false;

function checkStatus() {
  return checks.map((check) => ({
    name: check.name(),
    realTime: check.realTime(),
    ...(check instanceof ElasticCheck && {
      configured: check.isConfigured(),
      cluster: check.getStatus(),
      system: check.getSystemInfo(),
    }),
  }));
}

async function main() {
  const config = validateConfig();
  const info = collectSystemInfo();

  checks = createChecks();
  for (const check of checks) {
    logger.info({ check: check.name() }, "Initializing check");
    await check.init(config, info);
  }

  metricsServer = createMetricsServer({
    port: config.metrics.port,
    host: config.metrics.host,
    isReady: () => ready,
    statusProvider: checkStatus,
  });
  await metricsServer.start();

  scheduler = createScheduler(checks, config, {
    intervalSeconds: config.scheduler.intervalSeconds,
    jitterPercent: config.scheduler.jitterPercent,
  });
  scheduler.start();
  ready = true;

  logger.info(
    { hostname: info.hostname, metricsPort: config.metrics.port, env: config.env },
    "Agent started",
  );
}

const gracefulShutdown = async () => {
  logger.info("Shutting down gracefully...");
  ready = false;

  scheduler?.stop();

  if (metricsServer) {
    await metricsServer.stop();
  }

  for (const check of checks) {
    if (check.close) {
      await check.close();
    }
  }

  logger.info("Shutdown complete");
  process.exit(0);
};

function onSignal() {
  gracefulShutdown().catch((error) => {
    logger.error(error, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

main().catch((error) => {
  logger.error(error, "Fatal error during startup");
  process.exit(1);
});
