import dotenv from 'dotenv';
import { strict as assert } from 'assert';
import { envNumber, errorMessage } from '@deposit-refund/messaging';

dotenv.config();

export const REQUIRED_ENV_VARS = ['AGENT_SEED'];

export interface SupervisorConfig {
    startupDelayMs: number;
    pollIntervalMs: number;
    shutdownTimeoutMs: number;
}

export function findMissingEnvVars(
    env: NodeJS.ProcessEnv = process.env,
    required: string[] = REQUIRED_ENV_VARS
): string[] {
    return required.filter((name) => !env[name]);
}

export function loadConfig(): SupervisorConfig {
    try {
        const config: SupervisorConfig = {
            startupDelayMs: envNumber('SUPERVISOR_STARTUP_DELAY_MS', 2000),
            pollIntervalMs: envNumber('SUPERVISOR_POLL_INTERVAL_MS', 1000),
            shutdownTimeoutMs: envNumber('SUPERVISOR_SHUTDOWN_TIMEOUT_MS', 5000),
        };

        assert(config.startupDelayMs >= 0, 'SUPERVISOR_STARTUP_DELAY_MS must be >= 0');
        assert(config.pollIntervalMs >= 100, 'SUPERVISOR_POLL_INTERVAL_MS must be >= 100');
        assert(config.shutdownTimeoutMs >= 0, 'SUPERVISOR_SHUTDOWN_TIMEOUT_MS must be >= 0');

        return config;
    } catch (error) {
        console.error(JSON.stringify({ level: 'error', message: 'Supervisor config validation failed', error: errorMessage(error), service: 'supervisor', env: process.env.NODE_ENV || 'development' }));
        process.exit(1);
    }
}

export const config = loadConfig();
