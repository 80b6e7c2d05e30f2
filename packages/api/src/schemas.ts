import { z } from 'zod';
import {
    ValidationError,
    type ChatInferenceRequest,
    type ClientInfo,
    type CompletionInferenceRequest,
    type SamplingDefaults,
    type SamplingParams
} from '@kiln/core';

/*
 * Wire shapes only. Range checks on sampling values belong to the
 * dispatcher, which applies the configured ceilings.
 */

const stopSchema = z.union([z.string(), z.array(z.string())]).optional();

const samplingFields = {
    model: z.string().min(1).optional(),
    temperature: z.number().optional(),
    max_tokens: z.number().optional(),
    top_p: z.number().optional(),
    stop: stopSchema,
    session_id: z.string().optional()
};

export const chatCompletionBodySchema = z.object({
    messages: z.array(z.object({
        role: z.enum(['user', 'assistant', 'system']),
        content: z.string()
    })),
    stream: z.boolean().optional(),
    ...samplingFields
});

export const completionBodySchema = z.object({
    prompt: z.string(),
    stream: z.boolean().optional(),
    ...samplingFields
});

export const conversationQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(10)
});

export const statsQuerySchema = z.object({
    hours: z.coerce.number().int().min(1).max(24 * 365).default(24)
});

export type ChatCompletionBody = z.infer<typeof chatCompletionBodySchema>;
export type CompletionBody = z.infer<typeof completionBodySchema>;

/** Parses with `schema` or throws a `ValidationError` naming each bad field. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        }));
    }
    return parsed.data;
}

function rejectStreaming(stream: boolean | undefined): void {
    if (stream) {
        throw new ValidationError(['stream: Streaming responses are not supported']);
    }
}

function toSamplingParams(body: ChatCompletionBody | CompletionBody, defaults: SamplingDefaults): SamplingParams {
    const stop = typeof body.stop === 'string' ? [body.stop] : body.stop ?? defaults.stop;
    const params: SamplingParams = {
        model: body.model ?? defaults.model,
        temperature: body.temperature ?? defaults.temperature,
        maxTokens: body.max_tokens ?? defaults.maxTokens
    };
    const topP = body.top_p ?? defaults.topP;
    if (topP !== undefined) params.topP = topP;
    if (stop !== undefined) params.stop = stop;
    return params;
}

export function toChatRequest(body: ChatCompletionBody, defaults: SamplingDefaults, client: ClientInfo): ChatInferenceRequest {
    rejectStreaming(body.stream);
    return {
        kind: 'chat',
        messages: body.messages,
        params: toSamplingParams(body, defaults),
        sessionId: body.session_id,
        endpoint: '/v1/chat/completions',
        client
    };
}

export function toCompletionRequest(body: CompletionBody, defaults: SamplingDefaults, client: ClientInfo): CompletionInferenceRequest {
    rejectStreaming(body.stream);
    return {
        kind: 'completion',
        prompt: body.prompt,
        params: toSamplingParams(body, defaults),
        sessionId: body.session_id,
        endpoint: '/v1/completions',
        client
    };
}
