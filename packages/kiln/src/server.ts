import { createKiln } from './createKiln';
import { loadSettingsFromDotenv } from './settings';

const kiln = createKiln(loadSettingsFromDotenv());

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

let stopping = false;
async function stop(reason: string, exitCode = 0): Promise<void> {
    if (stopping) return;
    stopping = true;
    kiln.logger.info({ reason }, 'Shutting down');
    try {
        await kiln.close();
        process.exit(exitCode);
    } catch (error) {
        kiln.logger.error({ error: errorMessage(error) }, 'Shutdown failed');
        process.exit(1);
    }
}

process.on('SIGINT', (signal) => void stop(signal));
process.on('SIGTERM', (signal) => void stop(signal));

kiln.listen().catch((error: unknown) => {
    kiln.logger.fatal({ error: errorMessage(error) }, 'Gateway failed to start');
    void stop('startup failure', 1);
});
