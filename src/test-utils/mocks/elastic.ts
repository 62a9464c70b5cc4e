/**
 * Mock Elasticsearch client factories and an in-process fake cluster for testing
 */

import { createServer, type ServerResponse } from "node:http";
import type { ElasticClient, ElasticClientConfig, ElasticClientFactory } from "../../checkers/elastic";

export interface MockElasticResult {
  infoBody?: unknown;
  catMasterBody?: unknown;
  infoError?: Error;
  catMasterError?: Error;
  closeError?: Error;
}

export interface MockElasticFactory extends ElasticClientFactory {
  configs: ElasticClientConfig[];
  calls: { info: number; catMaster: number; close: number };
}

/**
 * Creates a mock client factory that records what it was asked to do.
 * `result` is read on every call, so tests may change it between runs.
 */
export function createMockElasticClientFactory(result: MockElasticResult = {}): MockElasticFactory {
  const configs: ElasticClientConfig[] = [];
  const calls = { info: 0, catMaster: 0, close: 0 };

  const factory = (config: ElasticClientConfig): ElasticClient => {
    configs.push(config);
    return {
      info: async () => {
        calls.info++;
        if (result.infoError) {
          throw result.infoError;
        }
        return result.infoBody ?? {};
      },
      catMaster: async () => {
        calls.catMaster++;
        if (result.catMasterError) {
          throw result.catMasterError;
        }
        return result.catMasterBody ?? [];
      },
      close: async () => {
        calls.close++;
        if (result.closeError) {
          throw result.closeError;
        }
      },
    };
  };

  return Object.assign(factory, { configs, calls });
}

/**
 * Factory that fails the way a malformed endpoint does
 */
export function createFailingElasticClientFactory(error: Error): ElasticClientFactory {
  return () => {
    throw error;
  };
}

/**
 * Root info body as returned by a single-node cluster
 */
export function createInfoBody(overrides: Partial<Record<"name" | "cluster_name" | "cluster_uuid", string>> = {}) {
  return {
    name: "i-ABC",
    cluster_name: "dd-test",
    cluster_uuid: "XYZ",
    version: { number: "6.8.23", lucene_version: "7.7.3" },
    tagline: "You Know, for Search",
    ...overrides,
  };
}

/**
 * `_cat/master?format=json` body naming the given node
 */
export function createCatMasterBody(node: string) {
  return [{ id: "node-id-1", host: "10.0.0.1", ip: "10.0.0.1", node }];
}

export interface FakeElasticServerOptions {
  infoBody: unknown;
  catMasterBody: unknown;
  /** Never answer `_cat/master` requests */
  stallCatMaster?: boolean;
}

/**
 * Serves `/` and `/_cat/master` on 127.0.0.1 the way a 6.x node does:
 * JSON bodies and no `x-elastic-product` header.
 */
export async function startFakeElasticServer(options: FakeElasticServerOptions) {
  const requests: string[] = [];

  const server = createServer((req, res) => {
    const url = req.url ?? "/";
    requests.push(`${req.method} ${url}`);
    const path = url.split("?")[0];

    if (path === "/") {
      return json(res, options.infoBody);
    }

    if (path === "/_cat/master") {
      if (options.stallCatMaster) return;
      return json(res, options.catMasterBody);
    }

    res.writeHead(404, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "not found" }));
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (!address || typeof address !== "object") {
    throw new Error("fake elasticsearch server has no address");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    stop(): Promise<void> {
      server.closeAllConnections();
      return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}

export type FakeElasticServer = Awaited<ReturnType<typeof startFakeElasticServer>>;

function json(res: ServerResponse, body: unknown): void {
  res.writeHead(200, { "Content-Type": "application/json; charset=UTF-8" });
  res.end(JSON.stringify(body));
}
