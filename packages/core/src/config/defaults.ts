import { type GatewayConfig } from './types';

/**
 * Default constants for the gateway configuration
 */
export const GATEWAY_DEFAULTS: GatewayConfig = {
  modelServer: {
    host: '127.0.0.1',
    port: 8081,
    binaryPath: 'llama-server',
    modelPath: '',
    contextSize: 32_768,
    threads: 8,
    batchSize: 2048,
    gpuLayers: 20,
    extraArgs: [],
    adoptExisting: false
  },
  supervisor: {
    startupTimeoutMs: 30_000,
    startupProbeIntervalMs: 1_000,
    probeIntervalMs: 5_000,
    probeTimeoutMs: 2_000,
    degradedAfterFailures: 1,
    crashedAfterFailures: 3,
    maxRestarts: 5,
    restartBackoffMs: 1_000,
    maxRestartBackoffMs: 30_000,
    restartResetAfterMs: 60_000,
    shutdownGraceMs: 5_000
  },
  dispatch: {
    /** One local accelerator serves one generation at a time. */
    slotCount: 1,
    slotWaitTimeoutMs: 10_000,
    maxQueuedRequests: 16,
    requestTimeoutMs: 60_000,
    maxTokensCeiling: 4096,
    maxContextTurns: 20,
    maxContextTokens: 4096
  },
  sessions: {
    idleTtlMs: 30 * 60_000,
    sweepIntervalMs: 60_000,
    maxTurnsPerSession: 50
  },
  usage: {
    queueCapacity: 1_000,
    batchSize: 20,
    persistRetries: 3,
    retryBaseDelayMs: 100,
    retryJitterMs: 25,
    drainTimeoutMs: 5_000
  },
  sampling: {
    model: 'mistral-7b-instruct',
    temperature: 0.7,
    maxTokens: 300,
    topP: 0.95,
    stop: ['[INST]', '</s>']
  }
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Default log level */
  LEVEL: 'info' as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
} as const;
