/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { Agent } from './agent';
import { AgentKey, AgentNetworkConfig } from './config/env';
import { AgentDirectory } from './directory';
import { createAgentIdentity } from './identity';
import { HttpTransport } from './transport/httpTransport';
import { MessagingLogger } from './utils/logger';

export interface AgentRuntime {
    agent: Agent;
    directory: AgentDirectory;
}

export function createDirectory(network: AgentNetworkConfig): AgentDirectory {
    const endpoints: Record<string, string> = {};
    for (const entry of Object.values(network.agents)) {
        endpoints[entry.name] = entry.endpoint;
    }

    return AgentDirectory.fromSeed(network.seed, endpoints);
}

/** Wires an agent for one process: identity from the shared seed, HTTP delivery to its peers. */
export function createAgentRuntime(
    key: AgentKey,
    network: AgentNetworkConfig,
    logger: MessagingLogger
): AgentRuntime {
    const identity = createAgentIdentity(network.seed, network.agents[key].name);
    const directory = createDirectory(network);
    const transport = new HttpTransport({
        signer: identity,
        logger,
        requestTimeoutMs: network.transport.requestTimeoutMs,
        retryAttempts: network.transport.retryAttempts,
        retryDelayMs: network.transport.retryDelayMs,
    });

    return {
        agent: new Agent({ identity, directory, transport, logger }),
        directory,
    };
}
