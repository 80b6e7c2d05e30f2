import {
    type ConversationRecord,
    type EndpointUsageStats,
    type UsageRecord,
    type UsageStatsReport,
    type UsageStorePort
} from '@kiln/core';

/**
 * In-memory usage store. Failures can be scheduled to exercise the
 * logger's retry and loss accounting.
 */
export class FakeUsageStore implements UsageStorePort {
    public readonly usage: UsageRecord[] = [];
    public readonly conversations: ConversationRecord[] = [];
    public insertAttempts = 0;
    private pendingFailures: Error[] = [];
    private failAlways: Error | null = null;
    private gate: Promise<void> | null = null;

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public failNext(count: number, error: Error = new Error('database is locked')): void {
        for (let i = 0; i < count; i++) {
            this.pendingFailures.push(error);
        }
    }

    public setFailing(error: Error | null): void {
        this.failAlways = error;
    }

    /** Holds every insert until the returned release function is called. */
    public hold(): () => void {
        let release: () => void = () => undefined;
        this.gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        return () => {
            this.gate = null;
            release();
        };
    }

    public async insertConversationTurn(record: ConversationRecord): Promise<number> {
        await this.beforeInsert();
        if (!this.conversations.some((existing) => existing.requestId === record.requestId)) {
            this.conversations.push({ ...record, id: this.conversations.length + 1 });
        }
        return this.conversations.findIndex((existing) => existing.requestId === record.requestId) + 1;
    }

    public async insertUsageRecord(record: UsageRecord): Promise<number> {
        await this.beforeInsert();
        if (!this.usage.some((existing) => existing.requestId === record.requestId)) {
            this.usage.push(record);
        }
        return this.usage.findIndex((existing) => existing.requestId === record.requestId) + 1;
    }

    public async queryConversation(sessionId: string, limit: number): Promise<ConversationRecord[]> {
        const matching = this.conversations.filter((record) => record.sessionId === sessionId);
        return matching.slice(Math.max(0, matching.length - limit));
    }

    public async queryStats(since: Date): Promise<UsageStatsReport> {
        const byEndpoint = new Map<string, UsageRecord[]>();
        for (const record of this.usage) {
            if (record.finishedAt < since) continue;
            const bucket = byEndpoint.get(record.endpoint) ?? [];
            bucket.push(record);
            byEndpoint.set(record.endpoint, bucket);
        }

        const stats: EndpointUsageStats[] = [...byEndpoint.entries()].map(([endpoint, records]) => ({
            endpoint,
            requestCount: records.length,
            avgLatencyMs: Math.round(records.reduce((sum, r) => sum + r.latencyMs, 0) / records.length),
            uniqueClients: new Set(records.flatMap((r) => (r.clientIp === null ? [] : [r.clientIp]))).size,
            errorCount: records.filter((r) => r.status !== 'ok').length
        }));
        stats.sort((a, b) => b.requestCount - a.requestCount || a.endpoint.localeCompare(b.endpoint));

        return { since, generatedAt: new Date(), stats };
    }

    private async beforeInsert(): Promise<void> {
        this.insertAttempts++;
        if (this.gate) {
            await this.gate;
        }
        const failure = this.pendingFailures.shift() ?? this.failAlways;
        if (failure) {
            throw failure;
        }
    }
}
