import { afterEach, describe, expect, it } from 'vitest';
import request from 'supertest';
import {
    CancelledError,
    InferenceError,
    InferenceTimeoutError,
    OverloadedError,
    ServiceUnavailableError,
    SessionBusyError,
    type DispatchError
} from '@kiln/core';
import { type Gateway, type GatewayStatus } from '@kiln/runtime';
import { FakeLogger, TEST_MODEL, createTestGateway, waitFor, type FakeGatewayDepsOptions } from '@kiln/testing';

import { createGatewayApp, type GatewayBackend } from '../src/index';

const NOW = new Date('2026-01-01T00:00:00Z');
const running: Gateway[] = [];

async function appWithGateway(options: FakeGatewayDepsOptions = {}) {
    const { gateway, deps } = createTestGateway(options);
    await gateway.start();
    running.push(gateway);
    const app = createGatewayApp({
        gateway,
        sampling: deps.config.sampling,
        logger: deps.logger,
        now: () => NOW
    });
    return { app, gateway, deps };
}

const readyStatus: GatewayStatus = {
    health: 'ready',
    model: TEST_MODEL,
    pid: 1000,
    uptimeSeconds: 5,
    restartAttempts: 0,
    sessions: 0,
    slots: { capacity: 1, inUse: 0, waiting: 0 },
    usage: { enqueued: 0, persisted: 0, dropped: 0, lost: 0, pending: 0 }
};

function stubBackend(handle: GatewayBackend['handle']): GatewayBackend {
    return {
        handle,
        status: () => readyStatus,
        conversationHistory: async () => [],
        usageStats: async () => ({ since: NOW, generatedAt: NOW, stats: [] })
    };
}

function appWithStub(handle: GatewayBackend['handle']) {
    return createGatewayApp({
        gateway: stubBackend(handle),
        sampling: { model: TEST_MODEL, temperature: 0.7, maxTokens: 300 },
        logger: new FakeLogger()
    });
}

const hello = { messages: [{ role: 'user', content: 'Hi' }], session_id: 's1' };

describe('gateway HTTP API', () => {
    afterEach(async () => {
        await Promise.all(running.splice(0).map((gateway) => gateway.close()));
    });

    it('answers chat completions in the OpenAI shape with the session id', async () => {
        const { app, deps } = await appWithGateway({
            inference: { responses: [{ text: 'Hello there', model: 'fake-model', usage: { promptTokens: 4, completionTokens: 2 } }] }
        });

        const response = await request(app).post('/v1/chat/completions').send(hello);

        expect(response.status).toBe(200);
        expect(response.body).toEqual({
            id: expect.stringMatching(/^chatcmpl-[0-9a-f]{8}$/),
            object: 'chat.completion',
            created: 1767225600,
            model: 'fake-model',
            choices: [{ index: 0, message: { role: 'assistant', content: 'Hello there' }, finish_reason: 'stop' }],
            usage: { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 },
            session_id: 's1'
        });
        expect(deps.inference.calls[0]?.params).toEqual({
            model: TEST_MODEL,
            temperature: 0.7,
            maxTokens: 300,
            topP: 0.95,
            stop: ['[INST]', '</s>']
        });
    });

    it('answers raw completions as text_completion objects', async () => {
        const { app } = await appWithGateway({ inference: { responses: [{ text: ' Paris.', model: 'fake-model' }] } });

        const response = await request(app)
            .post('/v1/completions')
            .send({ prompt: 'The capital of France is', max_tokens: 8, stop: '\n' });

        expect(response.status).toBe(200);
        expect(response.body).toMatchObject({
            object: 'text_completion',
            choices: [{ index: 0, text: 'Paris.', finish_reason: 'stop' }],
            usage: { prompt_tokens: 5, completion_tokens: 1, total_tokens: 6 }
        });
    });

    it('records the first X-Forwarded-For address as the client ip', async () => {
        const { app, gateway, deps } = await appWithGateway();

        await request(app)
            .post('/v1/chat/completions')
            .set('X-Forwarded-For', '203.0.113.7, 10.0.0.1')
            .send(hello);
        await gateway.close();

        expect(deps.store.usage[0]?.clientIp).toBe('203.0.113.7');
    });

    it('rejects streaming requests', async () => {
        const { app } = await appWithGateway();

        const response = await request(app).post('/v1/chat/completions').send({ ...hello, stream: true });

        expect(response.status).toBe(400);
        expect(response.body).toEqual({
            error: {
                code: 'ValidationError',
                message: 'Invalid request: stream: Streaming responses are not supported',
                retryable: false
            }
        });
    });

    it('rejects out-of-range sampling values', async () => {
        const { app, deps } = await appWithGateway();

        const response = await request(app).post('/v1/chat/completions').send({ ...hello, temperature: 3 });

        expect(response.status).toBe(400);
        expect(response.body.error.message).toBe('Invalid request: params.temperature: Number must be less than or equal to 2');
        expect(deps.inference.calls).toHaveLength(0);
    });

    it('rejects malformed JSON bodies', async () => {
        const { app } = await appWithGateway();

        const response = await request(app)
            .post('/v1/chat/completions')
            .set('Content-Type', 'application/json')
            .send('{"messages":');

        expect(response.status).toBe(400);
        expect(response.body.error).toEqual({ code: 'ValidationError', message: 'Malformed JSON body', retryable: false });
    });

    it.each<[DispatchError, number]>([
        [new SessionBusyError('s1'), 409],
        [new OverloadedError(1000), 503],
        [new InferenceTimeoutError(60000), 502],
        [new InferenceError(new Error('boom')), 502],
        [new ServiceUnavailableError('crashed'), 503],
        [new CancelledError('queue'), 499]
    ])('maps %s to HTTP %i', async (error, status) => {
        const app = appWithStub(async () => ({ ok: false, error }));

        const response = await request(app).post('/v1/chat/completions').send(hello);

        expect(response.status).toBe(status);
        expect(response.body).toEqual({ error: { code: error.code, message: error.message, retryable: error.retryable } });
    });

    it('tells overloaded clients when to retry', async () => {
        const app = appWithStub(async () => ({ ok: false, error: new OverloadedError(1000) }));

        const response = await request(app).post('/v1/chat/completions').send(hello);

        expect(response.headers['retry-after']).toBe('1');
    });

    it('aborts the request when the client disconnects', async () => {
        let aborted = false;
        const app = appWithStub((_request, options) => new Promise((resolve) => {
            options?.signal?.addEventListener('abort', () => {
                aborted = true;
                resolve({ ok: false, error: new CancelledError('inference') });
            });
        }));

        await expect(request(app).post('/v1/chat/completions').send(hello).timeout(50)).rejects.toThrow();
        await waitFor(() => aborted);
    });

    it('reports health with 200 while serving and 503 after shutdown', async () => {
        const { app, gateway } = await appWithGateway();

        const serving = await request(app).get('/health');
        expect(serving.status).toBe(200);
        expect(serving.body).toMatchObject({
            status: 'healthy',
            health: 'ready',
            model: TEST_MODEL,
            model_loaded: true,
            slots: { capacity: 1, in_use: 0, waiting: 0 },
            usage_logger: { enqueued: 0, persisted: 0, dropped: 0, lost: 0, pending: 0 }
        });

        await gateway.close();
        const stopped = await request(app).get('/health');
        expect(stopped.status).toBe(503);
        expect(stopped.body).toMatchObject({ status: 'unhealthy', health: 'shutting_down', model_loaded: false });
    });

    it('returns stored conversation history for a session', async () => {
        const { app, deps } = await appWithGateway({ inference: { responses: [{ text: 'Hello', model: 'fake-model' }] } });
        await request(app).post('/v1/chat/completions').send(hello);
        await waitFor(() => deps.store.conversations.length === 1);

        const response = await request(app).get('/v1/conversations/s1?limit=5');

        expect(response.status).toBe(200);
        expect(response.body.session_id).toBe('s1');
        expect(response.body.conversations).toEqual([
            expect.objectContaining({ user_message: 'Hi', assistant_response: 'Hello', model_name: 'fake-model', max_tokens: 300 })
        ]);
    });

    it('returns usage statistics for the requested window', async () => {
        const { app } = await appWithGateway();

        const response = await request(app).get('/v1/stats?hours=12');

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ stats: [], period_hours: 12, generated_at: expect.any(String) });
    });

    it('rejects a stats window that is not a number', async () => {
        const { app } = await appWithGateway();

        const response = await request(app).get('/v1/stats?hours=abc');

        expect(response.status).toBe(400);
        expect(response.body.error.code).toBe('ValidationError');
    });
});
