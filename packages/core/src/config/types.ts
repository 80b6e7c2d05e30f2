export interface ModelServerConfig {
  host: string;
  port: number;
  binaryPath: string;
  modelPath: string;
  contextSize: number;
  threads: number;
  batchSize: number;
  gpuLayers: number;
  extraArgs: string[];
  /** Use an already-healthy server on host:port instead of launching one. */
  adoptExisting: boolean;
}

export interface SupervisorConfig {
  startupTimeoutMs: number;
  startupProbeIntervalMs: number;
  probeIntervalMs: number;
  probeTimeoutMs: number;
  degradedAfterFailures: number;
  crashedAfterFailures: number;
  maxRestarts: number;
  restartBackoffMs: number;
  maxRestartBackoffMs: number;
  /** Ready time after which the restart attempt counter starts over. */
  restartResetAfterMs: number;
  shutdownGraceMs: number;
}

export interface DispatchConfig {
  slotCount: number;
  slotWaitTimeoutMs: number;
  maxQueuedRequests: number;
  requestTimeoutMs: number;
  maxTokensCeiling: number;
  maxContextTurns: number;
  maxContextTokens: number;
}

export interface SessionConfig {
  idleTtlMs: number;
  sweepIntervalMs: number;
  maxTurnsPerSession: number;
}

export interface UsageLoggingConfig {
  queueCapacity: number;
  batchSize: number;
  persistRetries: number;
  retryBaseDelayMs: number;
  retryJitterMs: number;
  drainTimeoutMs: number;
}

export interface SamplingDefaults {
  model: string;
  temperature: number;
  maxTokens: number;
  topP?: number;
  stop?: string[];
}

export interface GatewayConfig {
  modelServer: ModelServerConfig;
  supervisor: SupervisorConfig;
  dispatch: DispatchConfig;
  sessions: SessionConfig;
  usage: UsageLoggingConfig;
  sampling: SamplingDefaults;
}

export type GatewayConfigInput = {
  [K in keyof GatewayConfig]?: Partial<GatewayConfig[K]>;
};
