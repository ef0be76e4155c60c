import { AGENT_NAMES, createAgentRuntime, startAgentServer } from '@deposit-refund/messaging';
import { config } from './config';
import { RefundOrchestrator } from './core/refund-orchestrator';
import { Logger } from './utils/logger';

async function bootstrap(): Promise<void> {
  const { agent, directory } = createAgentRuntime('orchestrator', config.network, Logger);

  const orchestrator = new RefundOrchestrator({
    peers: {
      damageAssessor: directory.addressOf(AGENT_NAMES.damageAssessor),
      paymentProcessor: directory.addressOf(AGENT_NAMES.paymentProcessor),
    },
    claim: config.demoClaim,
    logger: Logger,
    responseTimeoutMs: config.responseTimeoutMs,
  });
  orchestrator.register(agent, config.refundIntervalMs);

  const server = await startAgentServer({
    service: 'orchestrator',
    receiver: agent,
    directory,
    logger: Logger,
    auth: config.network.auth,
    port: config.port,
  });

  agent.start();

  Logger.info('Refund orchestrator started', {
    address: agent.address,
    port: server.port,
    refundIntervalMs: config.refundIntervalMs,
    responseTimeoutMs: config.responseTimeoutMs,
    policyId: config.demoClaim.policy_id,
    damageAssessorEndpoint: config.network.agents.damageAssessor.endpoint,
    paymentProcessorEndpoint: config.network.agents.paymentProcessor.endpoint,
  });

  const shutdown = async (signal: string): Promise<void> => {
    Logger.info('Shutting down refund orchestrator', { signal });

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
  Logger.error('Refund orchestrator bootstrap failed', error);
  process.exit(1);
});
