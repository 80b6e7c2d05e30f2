import { EventEmitter } from 'node:events';
import {
  ProcessLaunchError,
  StartupTimeoutError,
  TimeoutError,
  UnrecoverableProcessError,
  isAcceptingWork,
  sleep,
  withTimeout,
  type HealthTransition,
  type InferenceClientPort,
  type Logger,
  type ModelProcessHandle,
  type ModelProcessLauncher,
  type ProcessHealth,
  type RuntimeResource,
  type SupervisorConfig
} from '@kiln/core';

export interface ModelProcessSupervisorOptions {
  config: SupervisorConfig;
  launcher: ModelProcessLauncher;
  inference: Pick<InferenceClientPort, 'probe'>;
  logger: Logger;
  /** Probe first and take over a server that is already healthy. */
  adoptExisting?: boolean;
}

class ShutdownRequested extends Error {
  public constructor() {
    super('Supervisor is shutting down');
    this.name = 'ShutdownRequested';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns the single local inference process and its health state machine.
 *
 * stopped → starting → ready ⇄ degraded → crashed → restarting → starting …
 * Too many failed restarts end in `unrecoverable`; `shutdown()` moves to
 * `shutting_down` from anywhere. Both are final.
 */
export class ModelProcessSupervisor implements RuntimeResource {
  private readonly emitter = new EventEmitter();
  private readonly logger: Logger;
  private readonly lifecycle = new AbortController();
  private readonly exitedProcesses = new WeakSet<ModelProcessHandle>();
  private state: ProcessHealth = 'stopped';
  private process: ModelProcessHandle | null = null;
  private consecutiveFailures = 0;
  private restartAttempts = 0;
  private probeTimer: ReturnType<typeof setTimeout> | null = null;
  private resetTimer: ReturnType<typeof setTimeout> | null = null;
  private checkInFlight: Promise<ProcessHealth> | null = null;
  private bringUpInFlight: Promise<void> | null = null;
  private restartInFlight: Promise<void> | null = null;
  private shutdownInFlight: Promise<void> | null = null;

  public constructor(private readonly options: ModelProcessSupervisorOptions) {
    this.logger = options.logger.child({ component: 'supervisor' });
  }

  public get health(): ProcessHealth {
    return this.state;
  }

  public get pid(): number | undefined {
    return this.process?.pid;
  }

  public get restartCount(): number {
    return this.restartAttempts;
  }

  public on(event: 'transition', listener: (transition: HealthTransition) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  public off(event: 'transition', listener: (transition: HealthTransition) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  public async start(): Promise<void> {
    if (this.state !== 'stopped') {
      throw new Error(`Supervisor cannot start from state ${this.state}`);
    }
    this.transition('starting', 'start requested');
    try {
      await this.trackBringUp();
    } catch (error) {
      this.transition('crashed', `startup failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  public close(): Promise<void> {
    return this.shutdown();
  }

  /** Terminal. Safe to call repeatedly and while a restart is underway. */
  public shutdown(): Promise<void> {
    if (!this.shutdownInFlight) {
      this.shutdownInFlight = this.runShutdown();
    }
    return this.shutdownInFlight;
  }

  /** Early failure signal from the request path. */
  public reportInferenceFailure(error: unknown): void {
    if (this.state !== 'ready') return;
    this.transition('degraded', `inference failure: ${errorMessage(error)}`);
  }

  /**
   * Runs one bounded probe and applies the failure thresholds.
   * Concurrent callers share the probe already in flight.
   */
  public healthCheck(): Promise<ProcessHealth> {
    if (!this.checkInFlight) {
      this.checkInFlight = this.runHealthCheck().finally(() => {
        this.checkInFlight = null;
      });
    }
    return this.checkInFlight;
  }

  private async runHealthCheck(): Promise<ProcessHealth> {
    if (!isAcceptingWork(this.state)) {
      return this.state;
    }

    const healthy = await this.probeOnce();
    if (!isAcceptingWork(this.state)) {
      return this.state;
    }

    if (healthy) {
      this.consecutiveFailures = 0;
      if (this.state === 'degraded') {
        this.transition('ready', 'probe recovered');
      }
      return this.state;
    }

    this.consecutiveFailures += 1;
    const { degradedAfterFailures, crashedAfterFailures } = this.options.config;
    this.logger.warn({ failures: this.consecutiveFailures }, 'Health probe failed');

    if (this.consecutiveFailures >= crashedAfterFailures) {
      this.crash(`${this.consecutiveFailures} consecutive probe failures`);
    } else if (this.consecutiveFailures >= degradedAfterFailures && this.state === 'ready') {
      this.transition('degraded', `${this.consecutiveFailures} consecutive probe failures`);
    }
    return this.state;
  }

  private async probeOnce(): Promise<boolean> {
    try {
      return await withTimeout({
        timeoutMs: this.options.config.probeTimeoutMs,
        label: 'Health probe',
        run: (signal) => this.options.inference.probe(signal)
      });
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        this.logger.debug({ error: errorMessage(error) }, 'Health probe threw');
      }
      return false;
    }
  }

  private trackBringUp(): Promise<void> {
    const run = this.bringUp();
    this.bringUpInFlight = run;
    return run.finally(() => {
      if (this.bringUpInFlight === run) {
        this.bringUpInFlight = null;
      }
    });
  }

  private async bringUp(): Promise<void> {
    const signal = this.lifecycle.signal;

    if (this.options.adoptExisting && await this.probeOnce()) {
      this.markReady('adopted running server');
      return;
    }

    const proc = await this.options.launcher.launch();
    this.process = proc;
    this.watchExit(proc);
    if (signal.aborted) {
      throw new ShutdownRequested();
    }

    try {
      await this.waitUntilHealthy(proc, signal);
    } catch (error) {
      if (!signal.aborted) {
        await this.terminateCurrent();
      }
      throw error;
    }
    this.markReady(`process ${proc.pid ?? 'unknown'} passed startup probe`);
  }

  private async waitUntilHealthy(proc: ModelProcessHandle, signal: AbortSignal): Promise<void> {
    const { startupTimeoutMs, startupProbeIntervalMs } = this.options.config;
    const deadline = Date.now() + startupTimeoutMs;

    for (;;) {
      if (signal.aborted) {
        throw new ShutdownRequested();
      }
      if (this.exitedProcesses.has(proc)) {
        throw new ProcessLaunchError('Model server exited during startup');
      }
      if (await this.probeOnce()) {
        return;
      }
      if (Date.now() >= deadline) {
        throw new StartupTimeoutError(startupTimeoutMs);
      }
      await sleep(startupProbeIntervalMs, signal);
    }
  }

  private watchExit(proc: ModelProcessHandle): void {
    void proc.exited.then((exit) => {
      this.exitedProcesses.add(proc);
      if (proc !== this.process) return;

      this.process = null;
      if (isAcceptingWork(this.state)) {
        this.logger.warn({ pid: proc.pid, code: exit.code, signal: exit.signal }, 'Model server exited unexpectedly');
        this.crash(`process exited (code ${exit.code ?? 'none'}, signal ${exit.signal ?? 'none'})`);
      }
    });
  }

  private markReady(reason: string): void {
    this.consecutiveFailures = 0;
    this.transition('ready', reason);
    this.scheduleProbe();

    this.clearResetTimer();
    this.resetTimer = setTimeout(() => {
      this.resetTimer = null;
      if (isAcceptingWork(this.state) && this.restartAttempts > 0) {
        this.logger.info({ attempts: this.restartAttempts }, 'Process stable; restart counter reset');
        this.restartAttempts = 0;
      }
    }, this.options.config.restartResetAfterMs);
    this.resetTimer.unref();
  }

  private scheduleProbe(): void {
    if (this.probeTimer || !isAcceptingWork(this.state)) return;
    this.probeTimer = setTimeout(() => {
      this.probeTimer = null;
      void this.healthCheck().then(() => this.scheduleProbe());
    }, this.options.config.probeIntervalMs);
    this.probeTimer.unref();
  }

  private crash(reason: string): void {
    this.clearProbeTimer();
    this.clearResetTimer();
    this.transition('crashed', reason);
    this.scheduleRestart();
  }

  private scheduleRestart(): void {
    if (this.restartInFlight || this.lifecycle.signal.aborted) return;
    this.restartInFlight = this.restartLoop().finally(() => {
      this.restartInFlight = null;
    });
  }

  private async restartLoop(): Promise<void> {
    const signal = this.lifecycle.signal;
    const { maxRestarts, restartBackoffMs, maxRestartBackoffMs } = this.options.config;

    while (!signal.aborted) {
      if (this.restartAttempts >= maxRestarts) {
        await this.terminateCurrent();
        const error = new UnrecoverableProcessError(this.restartAttempts);
        this.logger.fatal({ attempts: this.restartAttempts }, error.message);
        this.transition('unrecoverable', error.message);
        return;
      }

      this.restartAttempts += 1;
      const attempt = this.restartAttempts;
      const delayMs = Math.min(restartBackoffMs * 2 ** (attempt - 1), maxRestartBackoffMs);
      this.transition('restarting', `attempt ${attempt} of ${maxRestarts} in ${delayMs}ms`);

      try {
        await sleep(delayMs, signal);
        await this.terminateCurrent();
        this.transition('starting', `restart attempt ${attempt}`);
        await this.trackBringUp();
        return;
      } catch (error) {
        if (signal.aborted) return;
        this.logger.warn({ attempt, error: errorMessage(error) }, 'Restart attempt failed');
        this.transition('crashed', `restart attempt ${attempt} failed: ${errorMessage(error)}`);
      }
    }
  }

  private async runShutdown(): Promise<void> {
    this.transition('shutting_down', 'shutdown requested');
    this.lifecycle.abort(new ShutdownRequested());
    this.clearProbeTimer();
    this.clearResetTimer();

    await Promise.allSettled([this.restartInFlight, this.bringUpInFlight]);
    await this.terminateCurrent();
    this.logger.info('Supervisor shut down');
  }

  private async terminateCurrent(): Promise<void> {
    const proc = this.process;
    this.process = null;
    if (!proc) return;

    proc.kill('SIGTERM');
    try {
      await withTimeout({
        timeoutMs: this.options.config.shutdownGraceMs,
        label: 'Model server exit',
        run: () => proc.exited
      });
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      this.logger.warn({ pid: proc.pid }, 'Model server ignored SIGTERM; sending SIGKILL');
      proc.kill('SIGKILL');
      await proc.exited;
    }
  }

  private transition(to: ProcessHealth, reason: string): void {
    const from = this.state;
    if (from === to || from === 'shutting_down') return;
    if (from === 'unrecoverable' && to !== 'shutting_down') return;

    this.state = to;
    const transition: HealthTransition = { from, to, reason, at: new Date() };
    if (to === 'degraded' || to === 'crashed' || to === 'restarting') {
      this.logger.warn({ from, to, reason }, 'Model server health changed');
    } else if (to !== 'unrecoverable') {
      this.logger.info({ from, to, reason }, 'Model server health changed');
    }
    this.emitter.emit('transition', transition);
  }

  private clearProbeTimer(): void {
    if (this.probeTimer) {
      clearTimeout(this.probeTimer);
      this.probeTimer = null;
    }
  }

  private clearResetTimer(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = null;
    }
  }
}
