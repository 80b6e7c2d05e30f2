import { Writable } from 'node:stream';
import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { PinoLogger } from '../src/index';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(JSON.parse(chunk.toString()));
      callback();
    }
  });
  return { lines, instance: pino({ level: 'info', base: undefined, timestamp: false }, stream) };
}

describe('PinoLogger', () => {
  it('writes structured entries and plain messages', () => {
    const { lines, instance } = capture();
    const logger = new PinoLogger({ instance });

    logger.info({ requestId: 'req-1' }, 'Request completed');
    logger.warn('Usage queue full; dropped oldest record');
    logger.debug('hidden below the level');

    expect(lines).toEqual([
      { level: 30, requestId: 'req-1', msg: 'Request completed' },
      { level: 40, msg: 'Usage queue full; dropped oldest record' }
    ]);
  });

  it('carries child bindings onto every entry', () => {
    const { lines, instance } = capture();
    const logger = new PinoLogger({ instance }).child({ component: 'supervisor' });

    logger.fatal({ attempts: 3 }, 'Model server unrecoverable');

    expect(lines).toEqual([
      { level: 60, component: 'supervisor', attempts: 3, msg: 'Model server unrecoverable' }
    ]);
  });
});
