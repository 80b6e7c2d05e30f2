import { type InferenceRequest, type InferenceResult, type InferenceStatus } from './inference';

/**
 * Audit entry for one admitted request. Created when the request finishes,
 * written once, never updated.
 */
export interface UsageRecord {
  requestId    : string;
  endpoint     : string;
  sessionId    : string | null;
  request      : InferenceRequest;
  result       : InferenceResult | null;
  status       : InferenceStatus;
  errorCode    : string | null;
  errorMessage : string | null;
  clientIp     : string | null;
  userAgent    : string | null;
  startedAt    : Date;
  finishedAt   : Date;
  latencyMs    : number;
}

/** One user → assistant exchange, kept for conversation history queries. */
export interface ConversationRecord {
  id?               : number;
  requestId         : string;
  sessionId         : string;
  userMessage       : string;
  assistantResponse : string;
  modelName         : string;
  temperature       : number;
  maxTokens         : number;
  responseTimeMs    : number;
  tokensGenerated   : number;
  createdAt?        : Date;
}

export interface EndpointUsageStats {
  endpoint        : string;
  requestCount    : number;
  avgLatencyMs    : number;
  uniqueClients   : number;
  errorCount      : number;
}

export interface UsageStatsReport {
  since       : Date;
  generatedAt : Date;
  stats       : EndpointUsageStats[];
}
