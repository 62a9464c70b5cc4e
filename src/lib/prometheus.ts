/**
 * Prometheus metrics for the agent's checks
 */

import { Counter, collectDefaultMetrics, Gauge, Registry } from "prom-client";

const registry = new Registry();

// Process metrics (CPU, memory, event loop)
collectDefaultMetrics({ register: registry });

/**
 * Check runs by outcome
 */
export const checkRunsTotal = new Counter({
  name: "agent_check_runs_total",
  help: "Total number of check runs",
  labelNames: ["check", "result"] as const,
  registers: [registry],
});

/**
 * Duration of the last run of each check
 */
export const checkDuration = new Gauge({
  name: "agent_check_duration_seconds",
  help: "Time taken by the last run of a check",
  labelNames: ["check"] as const,
  registers: [registry],
});

/**
 * 1 when the local Elasticsearch node is the elected master
 */
export const elasticLeader = new Gauge({
  name: "agent_elastic_leader",
  help: "Whether the local Elasticsearch node is the elected master (0=no, 1=yes)",
  labelNames: ["cluster_uuid", "node"] as const,
  registers: [registry],
});

/**
 * Prometheus text exposition of all agent metrics
 */
export async function getMetrics(): Promise<string> {
  return await registry.metrics();
}

export function getRegistry(): Registry {
  return registry;
}

export function recordCheckRun(check: string, result: "ok" | "error", durationMs: number): void {
  checkRunsTotal.inc({ check, result }, 1);
  checkDuration.set({ check }, durationMs / 1000);
}

export function recordLeaderStatus(clusterUuid: string, node: string, isLeader: boolean): void {
  elasticLeader.reset();
  elasticLeader.set({ cluster_uuid: clusterUuid, node }, isLeader ? 1 : 0);
}
