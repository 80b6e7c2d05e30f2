import { afterEach, describe, expect, it } from 'vitest';
import { type UsageRecord } from '@kiln/core';

import { SqliteUsageStore } from '../src/index';

const now = new Date('2026-03-01T12:00:00Z');

function usage(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    requestId: 'req-1',
    endpoint: '/v1/chat/completions',
    sessionId: 's-1',
    request: {
      kind: 'chat',
      messages: [{ role: 'user', content: 'hi' }],
      params: { model: 'local-model', temperature: 0.7, maxTokens: 100 }
    },
    result: null,
    status: 'ok',
    errorCode: null,
    errorMessage: null,
    clientIp: '10.0.0.1',
    userAgent: 'vitest',
    startedAt: new Date(now.getTime() - 250),
    finishedAt: now,
    latencyMs: 250,
    ...overrides
  };
}

describe('SqliteUsageStore', () => {
  let store: SqliteUsageStore;

  afterEach(async () => {
    await store.close();
  });

  it('returns the latest conversation turns of a session, oldest first', async () => {
    store = new SqliteUsageStore({ path: ':memory:', now: () => now });

    for (let i = 1; i <= 3; i++) {
      await store.insertConversationTurn({
        requestId: `req-${i}`,
        sessionId: 's-1',
        userMessage: `question ${i}`,
        assistantResponse: `answer ${i}`,
        modelName: 'local-model',
        temperature: 0.7,
        maxTokens: 100,
        responseTimeMs: 100 * i,
        tokensGenerated: 2,
        createdAt: new Date(now.getTime() + i * 1000)
      });
    }

    const history = await store.queryConversation('s-1', 2);

    expect(history.map((record) => record.userMessage)).toEqual(['question 2', 'question 3']);
    expect(history[1]?.createdAt).toEqual(new Date(now.getTime() + 3000));
    expect(await store.queryConversation('other', 10)).toEqual([]);
  });

  it('keeps a single row when the same usage record is inserted twice', async () => {
    store = new SqliteUsageStore({ path: ':memory:', now: () => now });

    const first = await store.insertUsageRecord(usage());
    const second = await store.insertUsageRecord(usage());

    expect(second).toBe(first);
    const report = await store.queryStats(new Date(0));
    expect(report.stats).toEqual([
      { endpoint: '/v1/chat/completions', requestCount: 1, avgLatencyMs: 250, uniqueClients: 1, errorCount: 0 }
    ]);
  });

  it('aggregates per endpoint since the given time', async () => {
    store = new SqliteUsageStore({ path: ':memory:', now: () => now });

    await store.insertUsageRecord(usage({ requestId: 'a', latencyMs: 100 }));
    await store.insertUsageRecord(usage({ requestId: 'b', latencyMs: 300, clientIp: '10.0.0.2', status: 'timeout', errorCode: 'InferenceTimeout' }));
    await store.insertUsageRecord(usage({ requestId: 'c', endpoint: '/v1/completions', latencyMs: 50 }));
    await store.insertUsageRecord(usage({ requestId: 'old', finishedAt: new Date('2025-01-01T00:00:00Z') }));

    const report = await store.queryStats(new Date('2026-02-01T00:00:00Z'));

    expect(report.generatedAt).toEqual(now);
    expect(report.stats).toEqual([
      { endpoint: '/v1/chat/completions', requestCount: 2, avgLatencyMs: 200, uniqueClients: 2, errorCount: 1 },
      { endpoint: '/v1/completions', requestCount: 1, avgLatencyMs: 50, uniqueClients: 1, errorCount: 0 }
    ]);
  });

  it('leaves requests without a client ip out of the unique client count', async () => {
    store = new SqliteUsageStore({ path: ':memory:', now: () => now });

    await store.insertUsageRecord(usage({ requestId: 'a', clientIp: null }));
    await store.insertUsageRecord(usage({ requestId: 'b', clientIp: null }));
    await store.insertUsageRecord(usage({ requestId: 'c' }));

    const report = await store.queryStats(new Date(0));

    expect(report.stats).toEqual([
      { endpoint: '/v1/chat/completions', requestCount: 3, avgLatencyMs: 250, uniqueClients: 1, errorCount: 0 }
    ]);
  });
});
