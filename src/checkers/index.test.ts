import { describe, expect, test } from "vitest";
import { CheckError } from "../lib/errors";
import { createTestConfig } from "../test-utils";
import { createChecks, ElasticCheck, runCheck } from "./index";
import type { Check, MessageBody } from "./types";

function createFakeCheck(run: Check["run"]): Check {
  return {
    name: () => "fake",
    realTime: () => false,
    init: async () => {},
    run,
  };
}

describe("runCheck", () => {
  const config = createTestConfig();

  test("returns ok with the collected messages", async () => {
    const messages: MessageBody[] = [{ type: "shard", groupId: 4, payload: { index: "logs" } }];
    const outcome = await runCheck(createFakeCheck(async () => messages), config, 4);

    expect(outcome.check).toBe("fake");
    expect(outcome.state).toBe("ok");
    expect(outcome.reason).toBe("CHECK_OK");
    expect(outcome.message).toBe("Collected 1 messages");
    expect(outcome.messages).toEqual(messages);
    expect(outcome.durationMs).toBeGreaterThanOrEqual(0);
  });

  test("passes the group id through to the check", async () => {
    let seen = -1;
    await runCheck(
      createFakeCheck(async (_config, groupId) => {
        seen = groupId;
        return [];
      }),
      config,
      12,
    );

    expect(seen).toBe(12);
  });

  test("maps a check error to its reason", async () => {
    const outcome = await runCheck(
      createFakeCheck(async () => {
        throw new CheckError("no elasticsearch client configured", "NO_CLIENT");
      }),
      config,
      1,
    );

    expect(outcome.state).toBe("error");
    expect(outcome.reason).toBe("NO_CLIENT");
    expect(outcome.message).toBe("no elasticsearch client configured");
    expect(outcome.messages).toEqual([]);
  });

  test("maps any other error to EXECUTION_ERROR", async () => {
    const outcome = await runCheck(
      createFakeCheck(async () => {
        throw new Error("disk full");
      }),
      config,
      1,
    );

    expect(outcome.state).toBe("error");
    expect(outcome.reason).toBe("EXECUTION_ERROR");
    expect(outcome.message).toBe("disk full");
  });

  test("uses a generic message for non-Error throws", async () => {
    const outcome = await runCheck(
      createFakeCheck(async () => {
        throw "nope";
      }),
      config,
      1,
    );

    expect(outcome.reason).toBe("EXECUTION_ERROR");
    expect(outcome.message).toBe("Unknown error");
  });
});

describe("createChecks", () => {
  test("registers the elastic check", () => {
    const checks = createChecks();

    expect(checks).toHaveLength(1);
    expect(checks[0]).toBeInstanceOf(ElasticCheck);
    expect(checks[0]?.name()).toBe("elastic");
  });
});
