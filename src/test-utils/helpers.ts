/**
 * Test helper utilities
 */

import { vi } from "vitest";
import { type AgentConfig, loadConfig } from "../lib/config";
import type { SystemInfo } from "../lib/system-info";

/**
 * Creates a logger whose calls can be asserted
 */
export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export type MockLogger = ReturnType<typeof createMockLogger>;

/**
 * Agent config with no run delay, for tests
 */
export function createTestConfig(env: Record<string, string> = {}): AgentConfig {
  return loadConfig({ ELASTIC_CHECK_RUN_DELAY_MS: "0", ...env });
}

export function createSystemInfo(overrides: Partial<SystemInfo> = {}): SystemInfo {
  return {
    hostname: "agent-host",
    platform: "linux",
    arch: "x64",
    cpuCount: 4,
    totalMemoryBytes: 8 * 1024 * 1024 * 1024,
    ...overrides,
  };
}

/**
 * Wait for async operations
 */
export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
