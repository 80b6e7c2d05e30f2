import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { createInterface } from 'node:readline';
import {
    ProcessLaunchError,
    type Logger,
    type ModelProcessHandle,
    type ModelProcessLauncher,
    type ModelServerConfig,
    type ProcessExit
} from '@kiln/core';

export interface LlamaServerLauncherOptions {
    config: ModelServerConfig;
    /** Passed as `--parallel`; matches the gateway's slot count. */
    parallel: number;
    logger: Logger;
    cwd?: string;
}

export function buildLlamaServerArgs(config: ModelServerConfig, parallel: number): string[] {
    return [
        '-m', config.modelPath,
        '--host', config.host,
        '--port', String(config.port),
        '--ctx-size', String(config.contextSize),
        '--threads', String(config.threads),
        '--batch-size', String(config.batchSize),
        '--n-gpu-layers', String(config.gpuLayers),
        '--parallel', String(parallel),
        '--cont-batching',
        ...config.extraArgs
    ];
}

export class LlamaServerLauncher implements ModelProcessLauncher {
    private readonly logger: Logger;

    public constructor(private readonly opts: LlamaServerLauncherOptions) {
        this.logger = opts.logger.child({ component: 'llama-server' });
    }

    public async launch(): Promise<ModelProcessHandle> {
        const { config } = this.opts;
        if (!existsSync(config.modelPath)) {
            throw new ProcessLaunchError(`Model not found: ${config.modelPath}`);
        }
        if (config.binaryPath.includes('/') && !existsSync(config.binaryPath)) {
            throw new ProcessLaunchError(`Server binary not found: ${config.binaryPath}`);
        }

        const args = buildLlamaServerArgs(config, this.opts.parallel);
        const child = spawn(config.binaryPath, args, {
            cwd: this.opts.cwd ?? process.cwd(),
            stdio: ['ignore', 'pipe', 'pipe'],
            detached: false
        });

        const exited = new Promise<ProcessExit>((resolve) => {
            child.once('exit', (code, signal) => resolve({ code, signal }));
        });

        await new Promise<void>((resolve, reject) => {
            child.once('spawn', () => resolve());
            child.once('error', (error) => reject(new ProcessLaunchError(`Failed to spawn ${config.binaryPath}: ${error.message}`, { cause: error })));
        });

        const log = this.logger.child({ pid: child.pid });
        child.on('error', (error) => {
            log.warn({ error: error.message }, 'Model server process error');
        });
        for (const [stream, name] of [[child.stdout, 'stdout'], [child.stderr, 'stderr']] as const) {
            createInterface({ input: stream }).on('line', (line) => {
                log.debug({ stream: name }, line);
            });
        }

        log.info({ args }, 'Model server spawned');

        return {
            pid: child.pid,
            exited,
            kill: (signal) => {
                if (child.exitCode === null && child.signalCode === null) {
                    child.kill(signal);
                }
            }
        };
    }
}
