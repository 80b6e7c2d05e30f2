import { type ChatMessage, type SamplingParams, type TokenUsage } from '../entities/inference';
import { type RuntimeResource } from '../lifecycle';

export type GenerateInput =
  | { kind: 'chat'; messages: ChatMessage[]; params: SamplingParams }
  | { kind: 'completion'; prompt: string; params: SamplingParams };

export interface GenerateOutput {
  text   : string;
  model  : string;
  /** Absent when the server does not report token counts. */
  usage? : TokenUsage | undefined;
}

/**
 * Narrow contract with the local inference server.
 *
 * Callers own timeouts: `generate` runs until it settles or `signal` aborts.
 * Connection failures surface as rejected promises and are interpreted by the
 * caller as health signals.
 */
export interface InferenceClientPort extends RuntimeResource {
  probe(signal?: AbortSignal): Promise<boolean>;
  generate(input: GenerateInput, signal: AbortSignal): Promise<GenerateOutput>;
}
