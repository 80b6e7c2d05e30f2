import type Database from 'better-sqlite3';

export function ensureUsageSchema(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS conversations (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            request_id TEXT NOT NULL UNIQUE,
            session_id TEXT NOT NULL,
            user_message TEXT NOT NULL,
            assistant_response TEXT NOT NULL,
            model_name TEXT NOT NULL,
            temperature REAL DEFAULT 0.7,
            max_tokens INTEGER DEFAULT 300,
            response_time_ms INTEGER DEFAULT 0,
            tokens_generated INTEGER DEFAULT 0,
            created_at INTEGER NOT NULL
        );
    `);

    db.exec(`
        CREATE TABLE IF NOT EXISTS api_usage (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            request_id TEXT NOT NULL UNIQUE,
            endpoint TEXT NOT NULL,
            client_ip TEXT,
            user_agent TEXT,
            session_id TEXT,
            request_data TEXT,
            result_data TEXT,
            status TEXT NOT NULL,
            error_code TEXT,
            error_message TEXT,
            response_time_ms INTEGER DEFAULT 0,
            started_at INTEGER NOT NULL,
            created_at INTEGER NOT NULL
        );
    `);

    db.exec(`
        CREATE INDEX IF NOT EXISTS idx_conversations_session_id ON conversations(session_id);
        CREATE INDEX IF NOT EXISTS idx_conversations_created_at ON conversations(created_at);
        CREATE INDEX IF NOT EXISTS idx_api_usage_endpoint ON api_usage(endpoint);
        CREATE INDEX IF NOT EXISTS idx_api_usage_created_at ON api_usage(created_at);
        CREATE INDEX IF NOT EXISTS idx_api_usage_client_ip ON api_usage(client_ip);
    `);
}
