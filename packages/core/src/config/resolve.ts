import { GATEWAY_DEFAULTS } from './defaults';
import { type GatewayConfig, type GatewayConfigInput } from './types';

export function resolveGatewayConfig(input: GatewayConfigInput = {}): GatewayConfig {
  const resolved: GatewayConfig = {
    modelServer : { ...GATEWAY_DEFAULTS.modelServer, ...input.modelServer },
    supervisor  : { ...GATEWAY_DEFAULTS.supervisor,  ...input.supervisor },
    dispatch    : { ...GATEWAY_DEFAULTS.dispatch,    ...input.dispatch },
    sessions    : { ...GATEWAY_DEFAULTS.sessions,    ...input.sessions },
    usage       : { ...GATEWAY_DEFAULTS.usage,       ...input.usage },
    sampling    : { ...GATEWAY_DEFAULTS.sampling,    ...input.sampling }
  };

  validateGatewayConfig(resolved);
  return resolved;
}

export function validateGatewayConfig(config: GatewayConfig): void {
  const missing: string[] = [];
  const invalid: string[] = [];

  const positive = (path: string, value: number) => {
    if (!Number.isFinite(value) || value <= 0) invalid.push(path);
  };
  const nonNegative = (path: string, value: number) => {
    if (!Number.isFinite(value) || value < 0) invalid.push(path);
  };
  const positiveInt = (path: string, value: number) => {
    if (!Number.isInteger(value) || value <= 0) invalid.push(path);
  };

  if (!config.modelServer.host.trim()) missing.push('modelServer.host');
  if (!config.modelServer.adoptExisting) {
    if (!config.modelServer.binaryPath.trim()) missing.push('modelServer.binaryPath');
    if (!config.modelServer.modelPath.trim()) missing.push('modelServer.modelPath');
  }
  if (!Number.isInteger(config.modelServer.port) || config.modelServer.port <= 0 || config.modelServer.port > 65_535) {
    invalid.push('modelServer.port');
  }

  const { supervisor } = config;
  positive('supervisor.startupTimeoutMs', supervisor.startupTimeoutMs);
  positive('supervisor.startupProbeIntervalMs', supervisor.startupProbeIntervalMs);
  positive('supervisor.probeIntervalMs', supervisor.probeIntervalMs);
  positive('supervisor.probeTimeoutMs', supervisor.probeTimeoutMs);
  positiveInt('supervisor.degradedAfterFailures', supervisor.degradedAfterFailures);
  positiveInt('supervisor.crashedAfterFailures', supervisor.crashedAfterFailures);
  if (supervisor.crashedAfterFailures < supervisor.degradedAfterFailures) {
    invalid.push('supervisor.crashedAfterFailures');
  }
  nonNegative('supervisor.maxRestarts', supervisor.maxRestarts);
  nonNegative('supervisor.restartBackoffMs', supervisor.restartBackoffMs);
  nonNegative('supervisor.maxRestartBackoffMs', supervisor.maxRestartBackoffMs);
  nonNegative('supervisor.shutdownGraceMs', supervisor.shutdownGraceMs);

  const { dispatch } = config;
  positiveInt('dispatch.slotCount', dispatch.slotCount);
  nonNegative('dispatch.slotWaitTimeoutMs', dispatch.slotWaitTimeoutMs);
  nonNegative('dispatch.maxQueuedRequests', dispatch.maxQueuedRequests);
  positive('dispatch.requestTimeoutMs', dispatch.requestTimeoutMs);
  positiveInt('dispatch.maxTokensCeiling', dispatch.maxTokensCeiling);
  positiveInt('dispatch.maxContextTurns', dispatch.maxContextTurns);
  positiveInt('dispatch.maxContextTokens', dispatch.maxContextTokens);

  positive('sessions.idleTtlMs', config.sessions.idleTtlMs);
  positive('sessions.sweepIntervalMs', config.sessions.sweepIntervalMs);
  positiveInt('sessions.maxTurnsPerSession', config.sessions.maxTurnsPerSession);

  positiveInt('usage.queueCapacity', config.usage.queueCapacity);
  positiveInt('usage.batchSize', config.usage.batchSize);
  nonNegative('usage.persistRetries', config.usage.persistRetries);

  const { sampling } = config;
  if (!sampling.model.trim()) missing.push('sampling.model');
  if (sampling.temperature < 0 || sampling.temperature > 2) invalid.push('sampling.temperature');
  if (!Number.isInteger(sampling.maxTokens) || sampling.maxTokens < 1 || sampling.maxTokens > dispatch.maxTokensCeiling) {
    invalid.push('sampling.maxTokens');
  }

  if (missing.length > 0) {
    throw new Error(`Invalid gateway config: missing ${missing.join(', ')}`);
  }
  if (invalid.length > 0) {
    throw new Error(`Invalid gateway config: invalid ${invalid.join(', ')}`);
  }
}
