import type { AgentConfig } from "../lib/config";
import type { SystemInfo } from "../lib/system-info";

/**
 * Report message produced by a check run
 */
export interface MessageBody {
  type: string;
  groupId: number;
  payload: unknown;
}

/**
 * A periodic agent check.
 * `init` must complete before the first `run`.
 */
export interface Check {
  name(): string;
  /** True when the check only runs in real-time mode */
  realTime(): boolean;
  init(config: AgentConfig, info: SystemInfo): Promise<void>;
  run(config: AgentConfig, groupId: number): Promise<MessageBody[]>;
  close?(): Promise<void>;
}

export interface CheckOutcome {
  check: string;
  state: "ok" | "error";
  durationMs: number;
  messages: MessageBody[];
  reason: string;
  message: string;
}
