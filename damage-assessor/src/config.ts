import dotenv from 'dotenv';
import { AgentNetworkConfig, errorMessage, loadAgentNetworkConfig } from '@deposit-refund/messaging';

dotenv.config();

export interface DamageAssessorConfig {
    network: AgentNetworkConfig;
    port: number;
}

export function loadConfig(): DamageAssessorConfig {
    try {
        const network = loadAgentNetworkConfig();

        return {
            network,
            port: network.agents.damageAssessor.port,
        };
    } catch (error) {
        console.error(JSON.stringify({ level: 'error', message: 'Damage assessor config validation failed', error: errorMessage(error), service: 'damage-assessor', env: process.env.NODE_ENV || 'development' }));
        process.exit(1);
    }
}

export const config = loadConfig();
