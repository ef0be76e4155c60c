/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { createAgentIdentity } from './identity';
import { UnknownAgentError } from './utils/errors';

export interface AgentDirectoryEntry {
    name: string;
    address: string;
    endpoint: string;
    signingSecret: string;
}

export class AgentDirectory {
    private readonly byAddress = new Map<string, AgentDirectoryEntry>();
    private readonly byName = new Map<string, AgentDirectoryEntry>();

    constructor(entries: AgentDirectoryEntry[]) {
        for (const entry of entries) {
            if (this.byAddress.has(entry.address) || this.byName.has(entry.name)) {
                throw new Error(`Duplicate agent directory entry: ${entry.name}`);
            }

            this.byAddress.set(entry.address, entry);
            this.byName.set(entry.name, entry);
        }
    }

    static fromSeed(seed: string, endpoints: Record<string, string>): AgentDirectory {
        return new AgentDirectory(
            Object.entries(endpoints).map(([name, endpoint]) => ({
                ...createAgentIdentity(seed, name),
                endpoint,
            }))
        );
    }

    resolve(address: string): AgentDirectoryEntry | undefined {
        return this.byAddress.get(address);
    }

    require(address: string): AgentDirectoryEntry {
        const entry = this.resolve(address);
        if (!entry) {
            throw new UnknownAgentError(`Unknown agent address: ${address}`, { address });
        }

        return entry;
    }

    addressOf(name: string): string {
        const entry = this.byName.get(name);
        if (!entry) {
            throw new UnknownAgentError(`Unknown agent name: ${name}`, { name });
        }

        return entry.address;
    }

    entries(): AgentDirectoryEntry[] {
        return [...this.byAddress.values()];
    }
}
