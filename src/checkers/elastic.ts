import { Client } from "@elastic/elasticsearch";
import type { AgentConfig } from "../lib/config";
import { CheckError } from "../lib/errors";
import { type CheckLogger, logger as defaultLogger } from "../lib/logger";
import { Mutex } from "../lib/mutex";
import { jsonString } from "../lib/parsers/jsonpath";
import { recordLeaderStatus } from "../lib/prometheus";
import type { SystemInfo } from "../lib/system-info";
import type { Check, MessageBody } from "./types";

const UNKNOWN = "unknown";

/**
 * Elasticsearch client interface for dependency injection.
 * Both calls resolve to the decoded JSON body.
 */
export interface ElasticClient {
  info(): Promise<unknown>;
  catMaster(): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Elasticsearch client factory configuration
 */
export interface ElasticClientConfig {
  node: string;
  requestTimeoutMs?: number;
}

/**
 * Elasticsearch client factory type for dependency injection
 */
export type ElasticClientFactory = (config: ElasticClientConfig) => ElasticClient;

/**
 * Default client factory using @elastic/elasticsearch 7.x.
 * The 7.x client still talks to 6.x clusters, which the 8.x client refuses.
 * The client reads and releases each response body itself.
 */
export function createDefaultElasticClient(config: ElasticClientConfig): ElasticClient {
  const client = new Client({
    node: config.node,
    ...(config.requestTimeoutMs !== undefined && { requestTimeout: config.requestTimeoutMs }),
  });

  return {
    info: async () => {
      const response = await client.info();
      return response.body;
    },
    catMaster: async () => {
      const response = await client.cat.master({ format: "json" });
      return response.body;
    },
    close: async () => {
      await client.close();
    },
  };
}

export interface ClusterStatus {
  nodeName: string;
  clusterName: string;
  clusterUuid: string;
  isLeader: boolean;
  leaderCheckedAt: Date | null;
  lastRun: Date | null;
}

export interface ElasticCheckOptions {
  clientFactory?: ElasticClientFactory;
  logger?: CheckLogger;
  sleep?: (ms: number) => Promise<void>;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Reads the local Elasticsearch node's cluster identity and whether it is
 * the elected master.
 *
 * Leadership comes from a single `_cat/master` observation. During a split
 * brain several nodes can each see themselves as master.
 */
export class ElasticCheck implements Check {
  private readonly lock = new Mutex();
  private readonly clientFactory: ElasticClientFactory;
  private readonly logger: CheckLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  private client: ElasticClient | null = null;
  private sysInfo: SystemInfo | null = null;
  private status: ClusterStatus = {
    nodeName: "",
    clusterName: "",
    clusterUuid: "",
    isLeader: false,
    leaderCheckedAt: null,
    lastRun: null,
  };

  constructor(options: ElasticCheckOptions = {}) {
    this.clientFactory = options.clientFactory ?? createDefaultElasticClient;
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? delay;
  }

  name(): string {
    return "elastic";
  }

  realTime(): boolean {
    return false;
  }

  /**
   * Connect to the local node and take the first cluster and leader reading.
   * A client that cannot be created disables the check for good.
   */
  async init(config: AgentConfig, info: SystemInfo): Promise<void> {
    this.sysInfo = info;

    this.logger.debug({ node: config.elasticsearch.url }, "Creating elasticsearch client");

    let client: ElasticClient;
    try {
      client = this.clientFactory({
        node: config.elasticsearch.url,
        ...(config.elasticsearch.requestTimeoutMs !== undefined && {
          requestTimeoutMs: config.elasticsearch.requestTimeoutMs,
        }),
      });
    } catch (error) {
      this.logger.error({ error }, "Failed to create elasticsearch client");
      return;
    }

    this.client = client;
    await this.fetchClusterInfo(client);
    this.status.isLeader = await this.determineLeader(client);

    this.logger.info(
      { node: this.status.nodeName, leader: this.status.isLeader },
      "Elastic check initialized",
    );
  }

  async run(config: AgentConfig, groupId: number): Promise<MessageBody[]> {
    return await this.lock.runExclusive(async () => {
      const client = this.client;
      if (!client) {
        throw new CheckError("no elasticsearch client configured", "NO_CLIENT");
      }

      const start = new Date();
      this.status.lastRun = start;

      if (config.elasticsearch.leaderMode === "refresh") {
        if (this.status.nodeName === "") {
          await this.fetchClusterInfo(client);
        }
        this.status.isLeader = await this.determineLeader(client);
      }

      // Placeholder until shard collection exists
      await this.sleep(config.elasticsearch.runDelayMs);

      const shards: MessageBody[] = [];
      this.logger.info(
        { groupId, shards: shards.length, durationMs: Date.now() - start.getTime() },
        `Collected ${shards.length} shards`,
      );

      return shards;
    });
  }

  /**
   * Close the client once any in-flight run has finished
   */
  async close(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const client = this.client;
      this.client = null;
      if (client) {
        await client.close();
      }
    });
  }

  getStatus(): ClusterStatus {
    return { ...this.status };
  }

  getSystemInfo(): SystemInfo | null {
    return this.sysInfo;
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  private async fetchClusterInfo(client: ElasticClient): Promise<void> {
    let body: unknown;
    try {
      body = await client.info();
    } catch (error) {
      this.logger.error({ error }, "Failed to get elasticsearch info");
      return;
    }

    // {"name":"i-ABC","cluster_name":"dd-test","cluster_uuid":"HckBgZQ...","version":{...}}
    this.status.clusterName = this.readField(body, "cluster_name", "cluster name");
    this.status.clusterUuid = this.readField(body, "cluster_uuid", "cluster UUID");
    this.status.nodeName = this.readField(body, "name", "node name");

    this.logger.info(
      { cluster: this.status.clusterName, uuid: this.status.clusterUuid },
      "Elasticsearch cluster info loaded",
    );
  }

  private readField(body: unknown, path: string, label: string): string {
    const value = jsonString(body, path);
    if (value === "") {
      this.logger.warn({ field: path }, `Unable to find elasticsearch ${label}`);
      return UNKNOWN;
    }
    return value;
  }

  private async determineLeader(client: ElasticClient): Promise<boolean> {
    const isLeader = await this.readLeader(client);
    this.status.leaderCheckedAt = new Date();
    recordLeaderStatus(this.status.clusterUuid, this.status.nodeName, isLeader);
    return isLeader;
  }

  private async readLeader(client: ElasticClient): Promise<boolean> {
    let body: unknown;
    try {
      body = await client.catMaster();
    } catch (error) {
      this.logger.warn({ error }, "Failed to get elasticsearch leader info");
      return false;
    }

    // [{"id":"8iGt13GbTR63qMBN4F4imQ","host":"172.21.119.104","ip":"172.21.119.104","node":"i-ABDE"}]
    const leaderNode = jsonString(body, "$[0].node");
    if (leaderNode === "") {
      this.logger.warn("Unable to find elasticsearch leader, defaulting to not leader");
      return false;
    }

    return leaderNode === this.status.nodeName;
  }
}
