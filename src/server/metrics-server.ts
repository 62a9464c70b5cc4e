/**
 * Minimal HTTP server for Prometheus scraping, probes and check status
 */

import { createServer } from "node:http";
import { logger } from "../lib/logger";
import { getMetrics } from "../lib/prometheus";

export interface MetricsServerConfig {
  port: number;
  host: string;
  isReady?: () => boolean;
  statusProvider?: () => unknown;
}

export function createMetricsServer(config: MetricsServerConfig) {
  const server = createServer(async (req, res) => {
    if (req.method === "GET" && req.url === "/metrics") {
      try {
        const metrics = await getMetrics();
        res.writeHead(200, {
          "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
        });
        res.end(metrics);
      } catch (error) {
        logger.error({ error }, "Failed to generate metrics");
        res.writeHead(500);
        res.end("Internal Server Error\n");
      }
    } else if (req.url === "/health" || req.url === "/healthz") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("OK\n");
    } else if (req.url === "/ready" || req.url === "/readyz") {
      const ready = config.isReady ? config.isReady() : true;
      res.writeHead(ready ? 200 : 503, { "Content-Type": "text/plain" });
      res.end(ready ? "OK\n" : "Not Ready\n");
    } else if (req.method === "GET" && req.url === "/status" && config.statusProvider) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(config.statusProvider()));
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found\n");
    }
  });

  let listening = false;

  return {
    start(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          logger.info({ port: config.port, host: config.host }, "Metrics server started");
          listening = true;
          resolve();
        });
      });
    },

    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        if (!listening) {
          resolve();
          return;
        }

        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          listening = false;
          logger.info("Metrics server stopped");
          resolve();
        });
      });
    },

    address(): { port: number } | null {
      const addr = server.address();
      return addr && typeof addr === "object" ? { port: addr.port } : null;
    },
  };
}

export type MetricsServer = ReturnType<typeof createMetricsServer>;
