import { type ConversationRecord, type UsageRecord, type UsageStatsReport } from '../entities/usage';
import { type RuntimeResource } from '../lifecycle';

/**
 * Durable store for usage and conversation records.
 * The dispatch path only ever calls the insert operations; the query
 * operations serve the read-side routes.
 */
export interface UsageStorePort extends RuntimeResource {
  insertConversationTurn(record: ConversationRecord): Promise<number>;
  insertUsageRecord(record: UsageRecord): Promise<number>;
  queryConversation(sessionId: string, limit: number): Promise<ConversationRecord[]>;
  queryStats(since: Date): Promise<UsageStatsReport>;
}
