import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import {
    GATEWAY_DEFAULTS,
    LOGGING_DEFAULTS,
    resolveGatewayConfig,
    type GatewayConfig,
    type GatewayConfigInput
} from '@kiln/core';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const port = z.coerce.number().int().min(1).max(65_535);
const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const flag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const defaults = GATEWAY_DEFAULTS;

const envSchema = z.object({
    API_HOST: z.string().min(1).default('0.0.0.0'),
    API_PORT: port.default(9000),

    MODEL_NAME: z.string().min(1).default(defaults.sampling.model),
    MAX_TOKENS: positiveInt.default(defaults.sampling.maxTokens),
    DEFAULT_TEMPERATURE: z.coerce.number().min(0).max(2).default(defaults.sampling.temperature),

    MODEL_SERVER_HOST: z.string().min(1).default(defaults.modelServer.host),
    MODEL_SERVER_PORT: port.default(defaults.modelServer.port),
    MODEL_PATH: z.string().default(defaults.modelServer.modelPath),
    SERVER_BINARY: z.string().default(defaults.modelServer.binaryPath),
    ADOPT_EXISTING_SERVER: flag.default('false'),

    GPU_LAYERS: nonNegativeInt.default(defaults.modelServer.gpuLayers),
    CONTEXT_SIZE: positiveInt.default(defaults.modelServer.contextSize),
    BATCH_SIZE: positiveInt.default(defaults.modelServer.batchSize),
    THREADS: positiveInt.default(defaults.modelServer.threads),

    DATABASE_PATH: z.string().min(1).default('./data/kiln.db'),
    LOG_LEVEL: z
        .string()
        .transform((value) => value.toLowerCase())
        .pipe(z.enum(LOG_LEVELS))
        .default(LOGGING_DEFAULTS.LEVEL),
    LOG_PRETTY: flag.optional(),

    SLOT_COUNT: positiveInt.default(defaults.dispatch.slotCount),
    REQUEST_TIMEOUT_MS: positiveInt.default(defaults.dispatch.requestTimeoutMs),
    SLOT_WAIT_TIMEOUT_MS: nonNegativeInt.default(defaults.dispatch.slotWaitTimeoutMs),
    PROBE_INTERVAL_MS: positiveInt.default(defaults.supervisor.probeIntervalMs),
    DEGRADED_AFTER_FAILURES: positiveInt.default(defaults.supervisor.degradedAfterFailures),
    CRASHED_AFTER_FAILURES: positiveInt.default(defaults.supervisor.crashedAfterFailures),
    MAX_RESTARTS: nonNegativeInt.default(defaults.supervisor.maxRestarts),
    SESSION_IDLE_TTL_MS: positiveInt.default(defaults.sessions.idleTtlMs),
    MAX_TURNS_PER_SESSION: positiveInt.default(defaults.sessions.maxTurnsPerSession),
    USAGE_QUEUE_CAPACITY: positiveInt.default(defaults.usage.queueCapacity)
});

type GatewayEnv = z.infer<typeof envSchema>;

export interface KilnSettings {
    api: { host: string; port: number };
    databasePath: string;
    logging: { level: LogLevel; prettyPrint: boolean };
    gateway: GatewayConfig;
}

function toGatewayInput(env: GatewayEnv): GatewayConfigInput {
    return {
        modelServer: {
            host: env.MODEL_SERVER_HOST,
            port: env.MODEL_SERVER_PORT,
            binaryPath: env.SERVER_BINARY,
            modelPath: env.MODEL_PATH,
            contextSize: env.CONTEXT_SIZE,
            threads: env.THREADS,
            batchSize: env.BATCH_SIZE,
            gpuLayers: env.GPU_LAYERS,
            adoptExisting: env.ADOPT_EXISTING_SERVER
        },
        supervisor: {
            probeIntervalMs: env.PROBE_INTERVAL_MS,
            degradedAfterFailures: env.DEGRADED_AFTER_FAILURES,
            crashedAfterFailures: env.CRASHED_AFTER_FAILURES,
            maxRestarts: env.MAX_RESTARTS
        },
        dispatch: {
            slotCount: env.SLOT_COUNT,
            requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
            slotWaitTimeoutMs: env.SLOT_WAIT_TIMEOUT_MS
        },
        sessions: {
            idleTtlMs: env.SESSION_IDLE_TTL_MS,
            maxTurnsPerSession: env.MAX_TURNS_PER_SESSION
        },
        usage: {
            queueCapacity: env.USAGE_QUEUE_CAPACITY
        },
        sampling: {
            model: env.MODEL_NAME,
            maxTokens: env.MAX_TOKENS,
            temperature: env.DEFAULT_TEMPERATURE
        }
    };
}

/**
 * Builds settings from environment variables. Empty strings count as unset.
 * Throws with every offending variable named when a value does not parse.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): KilnSettings {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            present[key] = value.trim();
        }
    }

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid environment: ${issues.join('; ')}`);
    }

    const values = parsed.data;
    return {
        api: { host: values.API_HOST, port: values.API_PORT },
        databasePath: values.DATABASE_PATH,
        logging: {
            level: values.LOG_LEVEL,
            prettyPrint: values.LOG_PRETTY ?? LOGGING_DEFAULTS.PRETTY_PRINT
        },
        gateway: resolveGatewayConfig(toGatewayInput(values))
    };
}

/** Reads `.env` into `process.env` (existing variables win), then loads settings. */
export function loadSettingsFromDotenv(path?: string): KilnSettings {
    loadDotenv(path ? { path } : undefined);
    return loadSettings(process.env);
}
