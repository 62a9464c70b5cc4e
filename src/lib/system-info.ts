import os from "node:os";

export interface SystemInfo {
  hostname: string;
  platform: string;
  arch: string;
  cpuCount: number;
  totalMemoryBytes: number;
}

/**
 * Describe the host the agent runs on
 */
export function collectSystemInfo(): SystemInfo {
  return {
    hostname: process.env.HOSTNAME || os.hostname(),
    platform: os.platform(),
    arch: os.arch(),
    cpuCount: os.cpus().length,
    totalMemoryBytes: os.totalmem(),
  };
}
