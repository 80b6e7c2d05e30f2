import { describe, expect, it } from "vitest";
import { type ConversationRecord, type UsageLoggingConfig, type UsageRecord } from "@kiln/core";
import { FakeLogger, FakeUsageStore, createTestConfig } from "@kiln/testing";
import { UsageLogger } from "../src/index";

const at = new Date("2026-01-01T00:00:00Z");

function usage(requestId: string): UsageRecord {
  return {
    requestId,
    endpoint: "/v1/completions",
    sessionId: "s1",
    request: {
      kind: "completion",
      prompt: "hi",
      params: { model: "test-model", temperature: 0.7, maxTokens: 10 },
    },
    result: null,
    status: "ok",
    errorCode: null,
    errorMessage: null,
    clientIp: null,
    userAgent: null,
    startedAt: at,
    finishedAt: at,
    latencyMs: 0,
  };
}

function conversation(requestId: string): ConversationRecord {
  return {
    requestId,
    sessionId: "s1",
    userMessage: "hi",
    assistantResponse: "hello",
    modelName: "test-model",
    temperature: 0.7,
    maxTokens: 10,
    responseTimeMs: 0,
    tokensGenerated: 1,
  };
}

function setup(overrides: Partial<UsageLoggingConfig> = {}) {
  const store = new FakeUsageStore();
  const logger = new FakeLogger();
  const config = { ...createTestConfig().usage, ...overrides };
  return { store, logger, usageLogger: new UsageLogger({ config, store, logger }) };
}

describe("UsageLogger", () => {
  it("persists records and conversation turns in the background", async () => {
    const { store, usageLogger } = setup();

    usageLogger.record(usage("r1"), conversation("r1"));
    await usageLogger.close();

    expect(store.usage.map((record) => record.requestId)).toEqual(["r1"]);
    expect(store.conversations.map((record) => record.requestId)).toEqual(["r1"]);
    expect(usageLogger.stats()).toEqual({ enqueued: 1, persisted: 1, dropped: 0, lost: 0, pending: 0 });
  });

  it("returns before the store write completes", async () => {
    const { store, usageLogger } = setup();
    const release = store.hold();

    usageLogger.record(usage("r1"));

    expect(store.usage).toHaveLength(0);
    expect(usageLogger.stats().pending).toBe(1);
    release();
    await usageLogger.close();
    expect(store.usage).toHaveLength(1);
  });

  it("drops the oldest queued record when the queue is full", async () => {
    const { store, logger, usageLogger } = setup({ queueCapacity: 2 });
    const release = store.hold();

    for (const id of ["r1", "r2", "r3", "r4"]) {
      usageLogger.record(usage(id));
    }

    expect(usageLogger.stats()).toEqual({ enqueued: 4, persisted: 0, dropped: 1, lost: 0, pending: 3 });
    expect(logger.messages("warn")).toEqual(["Usage queue full; dropped oldest record"]);

    release();
    await usageLogger.close();

    expect(store.usage.map((record) => record.requestId)).toEqual(["r1", "r3", "r4"]);
    expect(usageLogger.stats().persisted).toBe(3);
  });

  it("retries transient store failures", async () => {
    const { store, logger, usageLogger } = setup({ persistRetries: 3 });
    store.failNext(2);

    usageLogger.record(usage("r1"));
    await usageLogger.close();

    expect(store.insertAttempts).toBe(3);
    expect(store.usage).toHaveLength(1);
    expect(logger.messages("warn")).toEqual(["Retrying usage persist", "Retrying usage persist"]);
    expect(usageLogger.stats()).toMatchObject({ persisted: 1, lost: 0 });
  });

  it("counts a record as lost once retries are exhausted", async () => {
    const { store, logger, usageLogger } = setup({ persistRetries: 2 });
    store.setFailing(new Error("disk full"));

    usageLogger.record(usage("r1"));
    await usageLogger.close();

    expect(store.insertAttempts).toBe(3);
    expect(usageLogger.stats()).toEqual({ enqueued: 1, persisted: 0, dropped: 0, lost: 1, pending: 0 });
    expect(logger.messages("error")).toEqual(["Usage record lost"]);
  });

  it("counts records handed over after close as dropped", async () => {
    const { store, usageLogger } = setup();
    await usageLogger.close();

    expect(() => usageLogger.record(usage("late"))).not.toThrow();
    expect(usageLogger.stats().dropped).toBe(1);
    expect(store.usage).toHaveLength(0);
  });
});
