/**
 * SPDX-License-Identifier: Apache-2.0
 */
import crypto from 'crypto';
import { ConfigurationError } from './utils/errors';

export const AGENT_ADDRESS_PREFIX = 'agent1q';
const ADDRESS_DIGEST_LENGTH = 56;

export interface AgentIdentity {
    name: string;
    address: string;
    signingSecret: string;
}

function deriveDigest(seed: string, purpose: string, name: string): string {
    if (!seed.trim()) {
        throw new ConfigurationError('Agent seed must not be empty');
    }

    if (!name.trim()) {
        throw new ConfigurationError('Agent name must not be empty');
    }

    return crypto.createHmac('sha256', seed).update(`${purpose}:${name}`).digest('hex');
}

/**
 * Every process shares the same seed, so each one can compute the address
 * of its peers without a registry service.
 */
export function deriveAgentAddress(seed: string, name: string): string {
    return `${AGENT_ADDRESS_PREFIX}${deriveDigest(seed, 'address', name).slice(0, ADDRESS_DIGEST_LENGTH)}`;
}

export function deriveSigningSecret(seed: string, name: string): string {
    return deriveDigest(seed, 'signing', name);
}

export function createAgentIdentity(seed: string, name: string): AgentIdentity {
    return {
        name,
        address: deriveAgentAddress(seed, name),
        signingSecret: deriveSigningSecret(seed, name),
    };
}
