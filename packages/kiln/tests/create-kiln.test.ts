import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createFakeGatewayDeps } from '@kiln/testing';

import { createKiln } from '../src/createKiln';
import { type KilnSettings } from '../src/settings';

function setup() {
    const deps = createFakeGatewayDeps();
    const settings: KilnSettings = {
        api: { host: '127.0.0.1', port: 0 },
        databasePath: ':memory:',
        logging: { level: 'info', prettyPrint: false },
        gateway: deps.config
    };
    const kiln = createKiln(settings, {
        logger: deps.logger,
        inference: deps.inference,
        launcher: deps.launcher,
        store: deps.store
    });
    return { kiln, deps };
}

describe('createKiln', () => {
    it('serves chat completions through the injected adapters', async () => {
        const { kiln, deps } = setup();
        await kiln.gateway.start();

        const response = await request(kiln.app)
            .post('/v1/chat/completions')
            .send({ messages: [{ role: 'user', content: 'Hello' }] });

        expect(response.status).toBe(200);
        expect(response.body.model).toBe('fake-model');
        expect(response.body.choices[0].message).toEqual({ role: 'assistant', content: 'Fake response' });
        expect(deps.inference.calls).toHaveLength(1);
        expect(deps.launcher.launched).toHaveLength(1);

        await kiln.close();
        expect(kiln.gateway.health).toBe('shutting_down');
        expect(deps.launcher.aliveCount).toBe(0);
    });

    it('starts the gateway before listening and stops both on close', async () => {
        const { kiln, deps } = setup();

        const server = await kiln.listen();
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Expected a TCP address');
        }
        expect(address.port).toBeGreaterThan(0);
        expect(kiln.gateway.health).toBe('ready');

        await kiln.close();
        expect(server.listening).toBe(false);
        expect(deps.launcher.aliveCount).toBe(0);
    });
});
