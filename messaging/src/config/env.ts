/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { strict as assert } from 'assert';

export const AGENT_NAMES = {
    damageAssessor: 'damage-assessor',
    paymentProcessor: 'payment-processor',
    orchestrator: 'orchestrator',
} as const;

export type AgentKey = keyof typeof AGENT_NAMES;

export interface AgentEndpointConfig {
    name: string;
    port: number;
    endpoint: string;
}

export interface EnvelopeAuthSettings {
    enabled: boolean;
    maxSkewSeconds: number;
    nonceTtlSeconds: number;
}

export interface TransportConfig {
    requestTimeoutMs: number;
    retryAttempts: number;
    retryDelayMs: number;
}

export interface AgentNetworkConfig {
    seed: string;
    auth: EnvelopeAuthSettings;
    transport: TransportConfig;
    agents: Record<AgentKey, AgentEndpointConfig>;
}

export function env(name: string): string {
    const value = process.env[name];
    assert(value, `${name} is missing`);
    return value;
}

export function envString(name: string, fallback: string): string {
    const value = process.env[name];
    if (value === undefined || value.trim() === '') {
        return fallback;
    }

    return value.trim();
}

export function envBool(name: string, fallback: boolean): boolean {
    const raw = process.env[name];
    if (raw === undefined || raw === '') {
        return fallback;
    }

    if (raw.toLowerCase() === 'true') {
        return true;
    }

    if (raw.toLowerCase() === 'false') {
        return false;
    }

    throw new Error(`${name} must be true or false`);
}

export function envNumber(name: string, fallback?: number): number {
    const raw = process.env[name];
    if ((raw === undefined || raw === '') && fallback !== undefined) {
        return fallback;
    }

    const value = raw ?? env(name);
    const parsed = Number.parseInt(value, 10);
    assert(!Number.isNaN(parsed), `${name} must be a number`);
    return parsed;
}

export function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') {
        return fallback;
    }

    const parsed = Number(raw);
    assert(Number.isFinite(parsed), `${name} must be a number`);
    return parsed;
}

const DEFAULT_PORTS: Record<AgentKey, number> = {
    damageAssessor: 8000,
    paymentProcessor: 8001,
    orchestrator: 8003,
};

const ENV_PREFIXES: Record<AgentKey, string> = {
    damageAssessor: 'DAMAGE_ASSESSOR',
    paymentProcessor: 'PAYMENT_PROCESSOR',
    orchestrator: 'ORCHESTRATOR',
};

function loadAgentEndpoint(key: AgentKey): AgentEndpointConfig {
    const prefix = ENV_PREFIXES[key];
    const port = envNumber(`${prefix}_PORT`, DEFAULT_PORTS[key]);
    assert(port > 0 && port <= 65535, `${prefix}_PORT must be between 1 and 65535`);

    return {
        name: AGENT_NAMES[key],
        port,
        endpoint: envString(`${prefix}_ENDPOINT`, `http://localhost:${port}/submit`),
    };
}

/** Settings every agent process shares: seed, auth, transport and peer endpoints. */
export function loadAgentNetworkConfig(): AgentNetworkConfig {
    const seed = env('AGENT_SEED');

    const config: AgentNetworkConfig = {
        seed,
        auth: {
            enabled: envBool('AUTH_ENABLED', true),
            maxSkewSeconds: envNumber('AUTH_MAX_SKEW_SECONDS', 300),
            nonceTtlSeconds: envNumber('AUTH_NONCE_TTL_SECONDS', 600),
        },
        transport: {
            requestTimeoutMs: envNumber('TRANSPORT_TIMEOUT_MS', 5000),
            retryAttempts: envNumber('TRANSPORT_RETRY_ATTEMPTS', 0),
            retryDelayMs: envNumber('TRANSPORT_RETRY_DELAY_MS', 250),
        },
        agents: {
            damageAssessor: loadAgentEndpoint('damageAssessor'),
            paymentProcessor: loadAgentEndpoint('paymentProcessor'),
            orchestrator: loadAgentEndpoint('orchestrator'),
        },
    };

    assert(config.auth.maxSkewSeconds > 0, 'AUTH_MAX_SKEW_SECONDS must be > 0');
    assert(
        config.auth.nonceTtlSeconds >= 60 && config.auth.nonceTtlSeconds <= 3600,
        'AUTH_NONCE_TTL_SECONDS must be between 60 and 3600'
    );
    assert(config.transport.requestTimeoutMs >= 100, 'TRANSPORT_TIMEOUT_MS must be >= 100');
    assert(
        config.transport.retryAttempts >= 0 && config.transport.retryAttempts <= 5,
        'TRANSPORT_RETRY_ATTEMPTS must be between 0 and 5'
    );
    assert(config.transport.retryDelayMs >= 0, 'TRANSPORT_RETRY_DELAY_MS must be >= 0');

    return config;
}
