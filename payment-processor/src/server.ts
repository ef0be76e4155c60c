import { createAgentRuntime, RunningAgentServer, startAgentServer } from '@deposit-refund/messaging';
import { config } from './config';
import { registerPaymentHandlers } from './handlers';
import { Logger } from './utils/logger';

async function bootstrap(): Promise<void> {
    const { agent, directory } = createAgentRuntime('paymentProcessor', config.network, Logger);
    registerPaymentHandlers(agent, Logger);

    const server: RunningAgentServer = await startAgentServer({
        service: 'payment-processor',
        receiver: agent,
        directory,
        logger: Logger,
        auth: config.network.auth,
        port: config.port,
    });

    agent.start();

    Logger.info('Payment processor started', {
        address: agent.address,
        port: server.port,
        authEnabled: config.network.auth.enabled,
    });

    const shutdown = async (signal: string): Promise<void> => {
        Logger.info('Shutting down payment processor', { signal });

        try {
            agent.stop();
            await server.close();
            process.exit(0);
        } catch (error) {
            Logger.error('Error during graceful shutdown', error);
            process.exit(1);
        }
    };

    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });

    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
}

bootstrap().catch((error: unknown) => {
    Logger.error('Payment processor bootstrap failed', error);
    process.exit(1);
});
