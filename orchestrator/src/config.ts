import dotenv from 'dotenv';
import { strict as assert } from 'assert';
import {
  AgentNetworkConfig,
  DamageRequest,
  envFloat,
  envNumber,
  envString,
  errorMessage,
  loadAgentNetworkConfig,
} from '@deposit-refund/messaging';

dotenv.config();

export interface OrchestratorConfig {
  network: AgentNetworkConfig;
  port: number;
  refundIntervalMs: number;
  /** 0 disables response timeouts. */
  responseTimeoutMs: number;
  demoClaim: DamageRequest;
}

export const DEFAULT_DEMO_CLAIM: DamageRequest = {
  before_image: 'https://example.com/before.jpg',
  after_image: 'https://example.com/after.jpg',
  claim_amount: 1000.0,
  policy_id: 'POL-12345',
};

export function loadConfig(): OrchestratorConfig {
  try {
    const network = loadAgentNetworkConfig();

    const config: OrchestratorConfig = {
      network,
      port: network.agents.orchestrator.port,
      refundIntervalMs: envNumber('REFUND_INTERVAL_MS', 10000),
      responseTimeoutMs: envNumber('WORKFLOW_RESPONSE_TIMEOUT_MS', 0),
      demoClaim: {
        before_image: envString('DEMO_BEFORE_IMAGE', DEFAULT_DEMO_CLAIM.before_image),
        after_image: envString('DEMO_AFTER_IMAGE', DEFAULT_DEMO_CLAIM.after_image),
        claim_amount: envFloat('DEMO_CLAIM_AMOUNT', DEFAULT_DEMO_CLAIM.claim_amount),
        policy_id: envString('DEMO_POLICY_ID', DEFAULT_DEMO_CLAIM.policy_id),
      },
    };

    assert(config.refundIntervalMs >= 100, 'REFUND_INTERVAL_MS must be >= 100');
    assert(config.responseTimeoutMs >= 0, 'WORKFLOW_RESPONSE_TIMEOUT_MS must be >= 0');

    return config;
  } catch (error) {
    console.error(JSON.stringify({ level: 'error', message: 'Orchestrator config validation failed', error: errorMessage(error), service: 'orchestrator', env: process.env.NODE_ENV || 'development' }));
    process.exit(1);
  }
}

export const config = loadConfig();
