import dotenv from 'dotenv';
import { AgentNetworkConfig, errorMessage, loadAgentNetworkConfig } from '@deposit-refund/messaging';

dotenv.config();

export interface PaymentProcessorConfig {
    network: AgentNetworkConfig;
    port: number;
}

export function loadConfig(): PaymentProcessorConfig {
    try {
        const network = loadAgentNetworkConfig();

        return {
            network,
            port: network.agents.paymentProcessor.port,
        };
    } catch (error) {
        console.error(JSON.stringify({ level: 'error', message: 'Payment processor config validation failed', error: errorMessage(error), service: 'payment-processor', env: process.env.NODE_ENV || 'development' }));
        process.exit(1);
    }
}

export const config = loadConfig();
