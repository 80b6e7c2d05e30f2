import OpenAI from 'openai';
import {
    type GenerateInput,
    type GenerateOutput,
    type InferenceClientPort,
    type SamplingParams
} from '@kiln/core';

export interface OpenAICompatibleInferenceOptions {
    /** Root of the local server, e.g. `http://127.0.0.1:8081`. */
    baseUrl: string;
    /** Local servers ignore it, but the SDK insists on one. */
    apiKey?: string;
    client?: OpenAI;
    healthPath?: string;
}

type SharedParams = Pick<
    OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
    'model' | 'temperature' | 'max_tokens' | 'top_p' | 'stop'
>;

function toSharedParams(params: SamplingParams): SharedParams {
    const shared: SharedParams = {
        model: params.model,
        temperature: params.temperature,
        max_tokens: params.maxTokens
    };
    if (params.topP !== undefined) {
        shared.top_p = params.topP;
    }
    if (params.stop && params.stop.length > 0) {
        shared.stop = params.stop;
    }
    return shared;
}

function toUsage(usage: OpenAI.Completions.CompletionUsage | undefined): GenerateOutput['usage'] {
    if (!usage) return undefined;
    return {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens
    };
}

/**
 * Talks to a llama-server style process through its OpenAI-compatible
 * `/v1` routes. Retries are disabled: re-running a generation is the
 * caller's decision.
 */
export class OpenAICompatibleInferenceClient implements InferenceClientPort {
    private readonly client: OpenAI;
    private readonly healthUrl: string;

    public constructor(opts: OpenAICompatibleInferenceOptions) {
        const root = opts.baseUrl.replace(/\/+$/, '');
        this.client = opts.client ?? new OpenAI({
            baseURL: `${root}/v1`,
            apiKey: opts.apiKey ?? 'sk-no-key-required',
            maxRetries: 0
        });
        this.healthUrl = `${root}${opts.healthPath ?? '/health'}`;
    }

    public async probe(signal?: AbortSignal): Promise<boolean> {
        try {
            const response = await fetch(this.healthUrl, { signal });
            return response.status === 200;
        } catch {
            return false;
        }
    }

    public async generate(input: GenerateInput, signal: AbortSignal): Promise<GenerateOutput> {
        if (input.kind === 'chat') {
            const response = await this.client.chat.completions.create({
                ...toSharedParams(input.params),
                messages: input.messages.map((message) => ({ role: message.role, content: message.content }))
            }, { signal });

            return {
                text: response.choices[0]?.message.content ?? '',
                model: response.model,
                usage: toUsage(response.usage)
            };
        }

        const response = await this.client.completions.create({
            ...toSharedParams(input.params),
            prompt: input.prompt
        }, { signal });

        return {
            text: response.choices[0]?.text ?? '',
            model: response.model,
            usage: toUsage(response.usage)
        };
    }
}
