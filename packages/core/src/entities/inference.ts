import { type TurnRole } from './session';

export interface ChatMessage {
  role    : TurnRole;
  content : string;
}

export interface SamplingParams {
  model       : string;
  temperature : number;
  maxTokens   : number;
  topP?       : number;
  stop?       : string[];
}

export interface ClientInfo {
  ip?        : string;
  userAgent? : string;
}

interface InferenceRequestBase {
  params    : SamplingParams;
  sessionId?: string;
  /** Route label stored on the usage record, e.g. `/v1/chat/completions`. */
  endpoint? : string;
  client?   : ClientInfo;
}

export interface ChatInferenceRequest extends InferenceRequestBase {
  kind     : 'chat';
  messages : ChatMessage[];
}

export interface CompletionInferenceRequest extends InferenceRequestBase {
  kind   : 'completion';
  prompt : string;
}

export type InferenceRequest = ChatInferenceRequest | CompletionInferenceRequest;

export interface TokenUsage {
  promptTokens     : number;
  completionTokens : number;
}

export type InferenceStatus = 'ok' | 'error' | 'timeout' | 'cancelled';

export interface InferenceResult {
  requestId : string;
  sessionId : string;
  text      : string;
  model     : string;
  usage     : TokenUsage;
  latencyMs : number;
  status    : InferenceStatus;
}
