import { describe, expect, it } from 'vitest';
import { ProcessLaunchError, resolveGatewayConfig } from '@kiln/core';

import {
  FakeInferenceClient,
  FakeLogger,
  FakeModelProcessLauncher,
  LlamaServerLauncher,
  buildLlamaServerArgs
} from '../src/index';

describe('fake adapters', () => {
  it('replays queued inference behaviours in order', async () => {
    const inference = new FakeInferenceClient({
      responses: [{ text: 'a', model: 'fake' }, new Error('server exploded')]
    });
    const signal = new AbortController().signal;
    const input = { kind: 'completion' as const, prompt: 'x', params: { model: 'fake', temperature: 0, maxTokens: 1 } };

    await expect(inference.generate(input, signal)).resolves.toEqual({ text: 'a', model: 'fake' });
    await expect(inference.generate(input, signal)).rejects.toThrow('server exploded');
    expect(inference.calls).toHaveLength(2);
    expect(inference.inFlight).toBe(0);
  });

  it('serves queued probe results before the steady health value', async () => {
    const inference = new FakeInferenceClient();
    inference.queueProbeResults(false, false);

    expect([await inference.probe(), await inference.probe(), await inference.probe()]).toEqual([false, false, true]);
  });

  it('only lets stubborn processes die on SIGKILL', async () => {
    const launcher = new FakeModelProcessLauncher({ ignoreSigterm: true });
    const proc = await launcher.launch();

    proc.kill('SIGTERM');
    expect(launcher.aliveCount).toBe(1);

    proc.kill('SIGKILL');
    await expect(proc.exited).resolves.toEqual({ code: null, signal: 'SIGKILL' });
    expect(launcher.aliveCount).toBe(0);
  });

  it('merges child bindings into captured log entries', () => {
    const logger = new FakeLogger();

    logger.child({ component: 'supervisor' }).warn({ failures: 2 }, 'probe failed');
    logger.info('plain');

    expect(logger.logs).toEqual([
      { level: 'warn', obj: { component: 'supervisor', failures: 2 }, msg: 'probe failed' },
      { level: 'info', msg: 'plain' }
    ]);
  });
});

describe('LlamaServerLauncher', () => {
  const config = resolveGatewayConfig({
    modelServer: { modelPath: '/nonexistent/models/local.gguf', port: 9100, extraArgs: ['--no-warmup'] }
  }).modelServer;

  it('builds the server command line from the model server config', () => {
    expect(buildLlamaServerArgs(config, 2)).toEqual([
      '-m', '/nonexistent/models/local.gguf',
      '--host', '127.0.0.1',
      '--port', '9100',
      '--ctx-size', '32768',
      '--threads', '8',
      '--batch-size', '2048',
      '--n-gpu-layers', '20',
      '--parallel', '2',
      '--cont-batching',
      '--no-warmup'
    ]);
  });

  it('refuses to launch when the model file is missing', async () => {
    const launcher = new LlamaServerLauncher({ config, parallel: 1, logger: new FakeLogger() });

    await expect(launcher.launch()).rejects.toBeInstanceOf(ProcessLaunchError);
    await expect(launcher.launch()).rejects.toThrow('Model not found: /nonexistent/models/local.gguf');
  });
});
