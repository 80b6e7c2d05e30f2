import { type Server } from 'node:http';
import { type Express } from 'express';
import {
    LlamaServerLauncher,
    OpenAICompatibleInferenceClient,
    PinoLogger,
    SqliteUsageStore
} from '@kiln/adapters';
import { createGatewayApp } from '@kiln/api';
import {
    type InferenceClientPort,
    type Logger,
    type ModelProcessLauncher,
    type UsageStorePort
} from '@kiln/core';
import { Gateway } from '@kiln/runtime';

import { type KilnSettings } from './settings';

/** Replace any of the real adapters, mostly for tests. */
export interface KilnOverrides {
    logger?: Logger;
    inference?: InferenceClientPort;
    launcher?: ModelProcessLauncher;
    store?: UsageStorePort;
    now?: () => Date;
}

export interface Kiln {
    readonly settings: KilnSettings;
    readonly logger: Logger;
    readonly gateway: Gateway;
    readonly app: Express;
    /** Starts the gateway, then binds the HTTP listener. */
    listen(): Promise<Server>;
    /** Stops accepting connections, then closes the gateway. */
    close(): Promise<void>;
}

export function createKiln(settings: KilnSettings, overrides: KilnOverrides = {}): Kiln {
    const config = settings.gateway;
    const logger = overrides.logger ?? new PinoLogger({
        name: 'kiln',
        level: settings.logging.level,
        prettyPrint: settings.logging.prettyPrint
    });

    const gateway = new Gateway({
        config,
        logger,
        now: overrides.now,
        store: overrides.store ?? new SqliteUsageStore({ path: settings.databasePath, now: overrides.now }),
        inference: overrides.inference ?? new OpenAICompatibleInferenceClient({
            baseUrl: `http://${config.modelServer.host}:${config.modelServer.port}`
        }),
        launcher: overrides.launcher ?? new LlamaServerLauncher({
            config: config.modelServer,
            parallel: config.dispatch.slotCount,
            logger
        })
    });

    const app = createGatewayApp({
        gateway,
        sampling: config.sampling,
        logger,
        now: overrides.now
    });

    let server: Server | undefined;

    return {
        settings,
        logger,
        gateway,
        app,

        async listen() {
            if (server) return server;
            await gateway.start();
            const { host, port } = settings.api;
            server = await new Promise<Server>((resolve, reject) => {
                const listening = app.listen(port, host, () => resolve(listening));
                listening.once('error', reject);
            });
            logger.info({ host, port }, 'HTTP API listening');
            return server;
        },

        async close() {
            const current = server;
            server = undefined;
            if (current) {
                await new Promise<void>((resolve, reject) => {
                    current.close((error) => (error ? reject(error) : resolve()));
                    current.closeAllConnections();
                });
            }
            await gateway.close();
        }
    };
}
