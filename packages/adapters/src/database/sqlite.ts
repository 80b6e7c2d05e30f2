import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import {
    type ConversationRecord,
    type EndpointUsageStats,
    type UsageRecord,
    type UsageStatsReport,
    type UsageStorePort
} from '@kiln/core';

import { ensureUsageSchema } from './schema';

interface ConversationRow {
    id: number;
    request_id: string;
    session_id: string;
    user_message: string;
    assistant_response: string;
    model_name: string;
    temperature: number;
    max_tokens: number;
    response_time_ms: number;
    tokens_generated: number;
    created_at: number;
}

interface StatsRow {
    endpoint: string;
    request_count: number;
    avg_response_time: number | null;
    unique_clients: number;
    error_count: number;
}

export interface SqliteUsageStoreOptions {
    /** File path, or `:memory:`. */
    path: string;
    now?: () => Date;
}

/**
 * Usage and conversation records in a local SQLite file.
 * Inserts are keyed on the request id, so retrying one is harmless.
 */
export class SqliteUsageStore implements UsageStorePort {
    private readonly db: Database.Database;
    private readonly now: () => Date;

    public constructor(opts: SqliteUsageStoreOptions) {
        if (opts.path !== ':memory:') {
            const resolved = path.resolve(opts.path);
            fs.mkdirSync(path.dirname(resolved), { recursive: true });
            this.db = new Database(resolved);
            this.db.pragma('journal_mode = WAL');
        } else {
            this.db = new Database(':memory:');
        }
        this.now = opts.now ?? (() => new Date());
        ensureUsageSchema(this.db);
    }

    public async close(): Promise<void> {
        if (this.db.open) {
            this.db.close();
        }
    }

    public async insertConversationTurn(record: ConversationRecord): Promise<number> {
        this.db.prepare(`
            INSERT INTO conversations (
                request_id, session_id, user_message, assistant_response, model_name,
                temperature, max_tokens, response_time_ms, tokens_generated, created_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT(request_id) DO NOTHING
        `).run(
            record.requestId,
            record.sessionId,
            record.userMessage,
            record.assistantResponse,
            record.modelName,
            record.temperature,
            record.maxTokens,
            record.responseTimeMs,
            record.tokensGenerated,
            (record.createdAt ?? this.now()).getTime()
        );

        return this.idFor('conversations', record.requestId);
    }

    public async insertUsageRecord(record: UsageRecord): Promise<number> {
        this.db.prepare(`
            INSERT INTO api_usage (
                request_id, endpoint, client_ip, user_agent, session_id, request_data, result_data,
                status, error_code, error_message, response_time_ms, started_at, created_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT(request_id) DO NOTHING
        `).run(
            record.requestId,
            record.endpoint,
            record.clientIp,
            record.userAgent,
            record.sessionId,
            JSON.stringify(record.request),
            record.result ? JSON.stringify(record.result) : null,
            record.status,
            record.errorCode,
            record.errorMessage,
            record.latencyMs,
            record.startedAt.getTime(),
            record.finishedAt.getTime()
        );

        return this.idFor('api_usage', record.requestId);
    }

    public async queryConversation(sessionId: string, limit: number): Promise<ConversationRecord[]> {
        const rows = this.db.prepare<[string, number], ConversationRow>(`
            SELECT * FROM conversations
            WHERE session_id = ?
            ORDER BY created_at DESC, id DESC
            LIMIT ?
        `).all(sessionId, limit);

        return rows.reverse().map((row) => ({
            id: row.id,
            requestId: row.request_id,
            sessionId: row.session_id,
            userMessage: row.user_message,
            assistantResponse: row.assistant_response,
            modelName: row.model_name,
            temperature: row.temperature,
            maxTokens: row.max_tokens,
            responseTimeMs: row.response_time_ms,
            tokensGenerated: row.tokens_generated,
            createdAt: new Date(row.created_at)
        }));
    }

    public async queryStats(since: Date): Promise<UsageStatsReport> {
        const rows = this.db.prepare<[number], StatsRow>(`
            SELECT
                endpoint,
                COUNT(*) AS request_count,
                AVG(response_time_ms) AS avg_response_time,
                COUNT(DISTINCT client_ip) AS unique_clients,
                SUM(CASE WHEN status != 'ok' THEN 1 ELSE 0 END) AS error_count
            FROM api_usage
            WHERE created_at >= ?
            GROUP BY endpoint
            ORDER BY request_count DESC, endpoint ASC
        `).all(since.getTime());

        const stats: EndpointUsageStats[] = rows.map((row) => ({
            endpoint: row.endpoint,
            requestCount: row.request_count,
            avgLatencyMs: Math.round(row.avg_response_time ?? 0),
            uniqueClients: row.unique_clients,
            errorCount: row.error_count
        }));

        return { since, generatedAt: this.now(), stats };
    }

    private idFor(table: 'conversations' | 'api_usage', requestId: string): number {
        const row = this.db.prepare<[string], { id: number }>(
            `SELECT id FROM ${table} WHERE request_id = ?`
        ).get(requestId);
        if (!row) {
            throw new Error(`Insert into ${table} for request ${requestId} left no row`);
        }
        return row.id;
    }
}
