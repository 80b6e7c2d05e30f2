import {
    type GenerateInput,
    type GenerateOutput,
    type InferenceClientPort
} from '@kiln/core';

export type FakeGenerateBehavior =
    | GenerateOutput
    | Error
    | ((input: GenerateInput, signal: AbortSignal) => Promise<GenerateOutput>);

export interface FakeInferenceClientOptions {
    responses?: FakeGenerateBehavior[];
    /** Simulated generation latency; honours the abort signal. */
    latencyMs?: number;
}

function abortable(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal.aborted) {
            reject(signal.reason);
            return;
        }
        const timer = setTimeout(resolve, ms);
        signal.addEventListener('abort', () => {
            clearTimeout(timer);
            reject(signal.reason);
        }, { once: true });
    });
}

export class FakeInferenceClient implements InferenceClientPort {
    public readonly calls: GenerateInput[] = [];
    public probeCount = 0;
    public inFlight = 0;
    public maxInFlight = 0;
    private responses: FakeGenerateBehavior[];
    private probeResults: boolean[] = [];
    private healthy = true;
    private callCount = 0;
    private readonly latencyMs: number;

    public constructor(options: FakeInferenceClientOptions = {}) {
        this.responses = options.responses ?? [{ text: 'Fake response', model: 'fake-model' }];
        this.latencyMs = options.latencyMs ?? 0;
    }

    public setResponses(responses: FakeGenerateBehavior[]): void {
        this.responses = responses;
        this.callCount = 0;
    }

    /** Every probe returns `healthy` once the queued results run out. */
    public setHealthy(healthy: boolean): void {
        this.healthy = healthy;
    }

    public queueProbeResults(...results: boolean[]): void {
        this.probeResults.push(...results);
    }

    public async probe(): Promise<boolean> {
        this.probeCount++;
        return this.probeResults.shift() ?? this.healthy;
    }

    public async generate(input: GenerateInput, signal: AbortSignal): Promise<GenerateOutput> {
        const behavior = this.responses[this.callCount % this.responses.length];
        if (!behavior) {
            throw new Error('FakeInferenceClient: No response available');
        }
        this.callCount++;
        this.calls.push(input);

        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            if (this.latencyMs > 0) {
                await abortable(this.latencyMs, signal);
            }
            if (typeof behavior === 'function') {
                return await behavior(input, signal);
            }
            if (behavior instanceof Error) {
                throw behavior;
            }
            return behavior;
        } finally {
            this.inFlight--;
        }
    }
}
