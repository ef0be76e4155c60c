import { errorMessage } from '@deposit-refund/messaging';
import { config, findMissingEnvVars } from './config';
import { selectServices } from './core/services';
import { ProcessSupervisor } from './core/supervisor';
import { Logger } from './utils/logger';

const WITH_ORCHESTRATOR_FLAG = '--with-orchestrator';

async function main(argv: string[]): Promise<void> {
    const missing = findMissingEnvVars();
    if (missing.length > 0) {
        Logger.error(`Missing environment variables: ${missing.join(', ')}`, {
            missing,
            hint: 'Please set them in your .env file',
        });
        process.exit(1);
    }

    Logger.info('Environment variables are set');

    const supervisor = new ProcessSupervisor({
        logger: Logger,
        shutdownTimeoutMs: config.shutdownTimeoutMs,
    });

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;

        Logger.info('Shutting down agents', { signal });

        try {
            await supervisor.shutdown();
            Logger.info('All agents stopped');
            process.exit(0);
        } catch (error) {
            Logger.error('Error during shutdown', error);
            process.exit(1);
        }
    };

    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });

    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });

    const services = selectServices(argv.includes(WITH_ORCHESTRATOR_FLAG));
    const launched = await supervisor.start(services, config.startupDelayMs);

    if (shuttingDown) {
        return;
    }

    Logger.info('All agents are running', {
        services: launched,
        orchestrator: launched.includes('orchestrator')
            ? 'running'
            : `start it with npm run start:orchestrator or pass ${WITH_ORCHESTRATOR_FLAG}`,
    });

    supervisor.startMonitoring(config.pollIntervalMs);
}

main(process.argv.slice(2)).catch((error: unknown) => {
    Logger.error('Supervisor failed', { error: errorMessage(error) });
    process.exit(1);
});
