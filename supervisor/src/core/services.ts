import path from 'path';

export interface ServiceDefinition {
    name: string;
    /** Entry point relative to the repository root. */
    entry: string;
}

export interface LaunchCommand {
    command: string;
    args: string[];
}

export const REPO_ROOT = path.resolve(__dirname, '..', '..', '..');

// Launch order matters: the assessor gets a head start on the processor.
export const AGENT_SERVICES: ServiceDefinition[] = [
    { name: 'damage-assessor', entry: 'damage-assessor/src/server.ts' },
    { name: 'payment-processor', entry: 'payment-processor/src/server.ts' },
];

export const ORCHESTRATOR_SERVICE: ServiceDefinition = {
    name: 'orchestrator',
    entry: 'orchestrator/src/server.ts',
};

export function selectServices(withOrchestrator: boolean): ServiceDefinition[] {
    return withOrchestrator ? [...AGENT_SERVICES, ORCHESTRATOR_SERVICE] : [...AGENT_SERVICES];
}

/** Runs the service's TypeScript entry under the current node binary. */
export function buildLaunchCommand(service: ServiceDefinition, repoRoot: string = REPO_ROOT): LaunchCommand {
    return {
        command: process.execPath,
        args: ['-r', 'ts-node/register/transpile-only', path.join(repoRoot, service.entry)],
    };
}
