import express, {
    Router,
    type Express,
    type NextFunction,
    type Request,
    type Response
} from 'express';
import {
    isAcceptingWork,
    isDispatchError,
    type ClientInfo,
    type ConversationRecord,
    type InferenceResult,
    type Logger,
    type SamplingDefaults,
    type UsageStatsReport
} from '@kiln/core';
import { type DispatchOutcome, type GatewayStatus, type HandleOptions } from '@kiln/runtime';

import { sendDispatchError, sendError } from './http-errors';
import {
    chatCompletionBodySchema,
    completionBodySchema,
    conversationQuerySchema,
    parseOrThrow,
    statsQuerySchema,
    toChatRequest,
    toCompletionRequest
} from './schemas';

/** The part of the gateway the HTTP layer talks to. */
export interface GatewayBackend {
    handle(request: unknown, options?: HandleOptions): Promise<DispatchOutcome>;
    status(): GatewayStatus;
    conversationHistory(sessionId: string, limit: number): Promise<ConversationRecord[]>;
    usageStats(hours: number): Promise<UsageStatsReport>;
}

export interface GatewayApiOptions {
    gateway: GatewayBackend;
    sampling: SamplingDefaults;
    logger: Logger;
    /** Sent as `Retry-After` with 503 Overloaded responses. */
    retryAfterSeconds?: number;
    now?: () => Date;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

export function clientInfo(req: Request): ClientInfo {
    const forwarded = req.headers['x-forwarded-for'];
    const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(',')[0]?.trim();
    const info: ClientInfo = {};
    const ip = first || req.socket.remoteAddress;
    if (ip) info.ip = ip;
    const userAgent = req.get('user-agent');
    if (userAgent) info.userAgent = userAgent;
    return info;
}

/** Aborts when the client goes away before the response is written. */
function disconnectSignal(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort(new Error('Client disconnected'));
        }
    });
    return controller.signal;
}

function completionId(prefix: string, requestId: string): string {
    return `${prefix}-${requestId.replace(/-/g, '').slice(0, 8)}`;
}

/** Maps dispatch errors to their HTTP status and anything else to a 500. */
export function createErrorHandler(logger: Logger, retryAfterSeconds: number) {
    return (error: unknown, _req: Request, res: Response, next: NextFunction): void => {
        if (isDispatchError(error)) {
            sendDispatchError(res, error, retryAfterSeconds);
            return;
        }
        if (error instanceof SyntaxError) {
            sendError(res, 400, { error: { code: 'ValidationError', message: 'Malformed JSON body', retryable: false } });
            return;
        }
        if (res.headersSent) {
            next(error);
            return;
        }
        logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Unhandled API error');
        sendError(res, 500, { error: { code: 'InternalError', message: 'Internal server error', retryable: true } });
    };
}

/**
 * OpenAI-shaped chat and completion routes plus health, conversation
 * history and usage statistics.
 */
export function createGatewayApi(options: GatewayApiOptions): Router {
    const router = Router();
    const logger = options.logger.child({ component: 'http' });
    const retryAfter = options.retryAfterSeconds ?? 1;
    const now = options.now ?? (() => new Date());
    const created = () => Math.floor(now().getTime() / 1000);

    const dispatch = async (res: Response, request: unknown): Promise<InferenceResult | null> => {
        const outcome = await options.gateway.handle(request, { signal: disconnectSignal(res) });
        if (!outcome.ok) {
            sendDispatchError(res, outcome.error, retryAfter);
            return null;
        }
        return outcome.result;
    };

    router.post('/v1/chat/completions', route(async (req, res) => {
        const body = parseOrThrow(chatCompletionBodySchema, req.body);
        const result = await dispatch(res, toChatRequest(body, options.sampling, clientInfo(req)));
        if (!result) return;

        res.json({
            id: completionId('chatcmpl', result.requestId),
            object: 'chat.completion',
            created: created(),
            model: result.model,
            choices: [{
                index: 0,
                message: { role: 'assistant', content: result.text },
                finish_reason: 'stop'
            }],
            usage: {
                prompt_tokens: result.usage.promptTokens,
                completion_tokens: result.usage.completionTokens,
                total_tokens: result.usage.promptTokens + result.usage.completionTokens
            },
            session_id: result.sessionId
        });
    }));

    router.post('/v1/completions', route(async (req, res) => {
        const body = parseOrThrow(completionBodySchema, req.body);
        const result = await dispatch(res, toCompletionRequest(body, options.sampling, clientInfo(req)));
        if (!result) return;

        res.json({
            id: completionId('cmpl', result.requestId),
            object: 'text_completion',
            created: created(),
            model: result.model,
            choices: [{ index: 0, text: result.text, finish_reason: 'stop' }],
            usage: {
                prompt_tokens: result.usage.promptTokens,
                completion_tokens: result.usage.completionTokens,
                total_tokens: result.usage.promptTokens + result.usage.completionTokens
            }
        });
    }));

    router.get('/health', (_req, res) => {
        const status = options.gateway.status();
        const accepting = isAcceptingWork(status.health);
        res.status(accepting ? 200 : 503).json({
            status: accepting ? 'healthy' : 'unhealthy',
            health: status.health,
            model: status.model,
            model_loaded: accepting,
            uptime_seconds: status.uptimeSeconds,
            restart_attempts: status.restartAttempts,
            active_sessions: status.sessions,
            slots: {
                capacity: status.slots.capacity,
                in_use: status.slots.inUse,
                waiting: status.slots.waiting
            },
            usage_logger: status.usage
        });
    });

    router.get('/v1/conversations/:sessionId', route(async (req, res) => {
        const { limit } = parseOrThrow(conversationQuerySchema, req.query);
        const sessionId = req.params.sessionId ?? '';
        const history = await options.gateway.conversationHistory(sessionId, limit);

        res.json({
            session_id: sessionId,
            conversations: history.map((record) => ({
                id: record.id ?? null,
                user_message: record.userMessage,
                assistant_response: record.assistantResponse,
                model_name: record.modelName,
                temperature: record.temperature,
                max_tokens: record.maxTokens,
                response_time_ms: record.responseTimeMs,
                tokens_generated: record.tokensGenerated,
                created_at: record.createdAt?.toISOString() ?? null
            }))
        });
    }));

    router.get('/v1/stats', route(async (req, res) => {
        const { hours } = parseOrThrow(statsQuerySchema, req.query);
        const report = await options.gateway.usageStats(hours);

        res.json({
            stats: report.stats.map((row) => ({
                endpoint: row.endpoint,
                request_count: row.requestCount,
                avg_response_time: row.avgLatencyMs,
                unique_clients: row.uniqueClients,
                error_count: row.errorCount
            })),
            period_hours: hours,
            generated_at: report.generatedAt.toISOString()
        });
    }));

    router.use(createErrorHandler(logger, retryAfter));

    return router;
}

/** Express app with JSON parsing and the gateway routes mounted at the root. */
export function createGatewayApp(options: GatewayApiOptions): Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: '1mb' }));
    app.use(createGatewayApi(options));
    app.use(createErrorHandler(options.logger.child({ component: 'http' }), options.retryAfterSeconds ?? 1));
    return app;
}
