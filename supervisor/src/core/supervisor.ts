import { spawn, SpawnOptions } from 'child_process';
import readline from 'readline';
import { Readable } from 'stream';
import { errorMessage, MessagingLogger } from '@deposit-refund/messaging';
import { buildLaunchCommand, REPO_ROOT, ServiceDefinition } from './services';

/** The parts of a ChildProcess the supervisor relies on. */
export interface SupervisedChild {
    readonly pid?: number;
    readonly exitCode: number | null;
    readonly signalCode: NodeJS.Signals | null;
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals): boolean;
    once(event: 'spawn', listener: () => void): unknown;
    once(event: 'error', listener: (error: Error) => void): unknown;
    once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => SupervisedChild;

export interface ProcessSupervisorOptions {
    logger: MessagingLogger;
    shutdownTimeoutMs: number;
    spawnProcess?: SpawnProcess;
    writeLine?: (line: string) => void;
    env?: NodeJS.ProcessEnv;
    repoRoot?: string;
}

interface RunningService {
    definition: ServiceDefinition;
    child: SupervisedChild;
    reportedStopped: boolean;
}

function hasExited(child: SupervisedChild): boolean {
    return child.exitCode !== null || child.signalCode !== null;
}

function waitForSpawn(child: SupervisedChild): Promise<Error | undefined> {
    return new Promise((resolve) => {
        child.once('spawn', () => resolve(undefined));
        child.once('error', (error) => resolve(error));
    });
}

function waitForExit(child: SupervisedChild, timeoutMs?: number): Promise<boolean> {
    if (hasExited(child)) {
        return Promise.resolve(true);
    }

    return new Promise((resolve) => {
        let timer: NodeJS.Timeout | undefined;

        if (timeoutMs !== undefined) {
            timer = setTimeout(() => resolve(false), timeoutMs);
        }

        child.once('exit', () => {
            if (timer) {
                clearTimeout(timer);
            }
            resolve(true);
        });
    });
}

async function sleep(ms: number): Promise<void> {
    if (ms <= 0) {
        return;
    }

    await new Promise((resolve) => setTimeout(resolve, ms));
}

export class ProcessSupervisor {
    private readonly services: RunningService[] = [];
    private readonly pendingLaunches = new Set<Promise<boolean>>();
    private readonly spawnProcess: SpawnProcess;
    private readonly writeLine: (line: string) => void;
    private monitorId?: NodeJS.Timeout;
    private stopping = false;

    constructor(private readonly options: ProcessSupervisorOptions) {
        this.spawnProcess = options.spawnProcess ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
        this.writeLine = options.writeLine ?? ((line) => {
            process.stdout.write(`${line}\n`);
        });
    }

    runningServices(): string[] {
        return this.services.map((service) => service.definition.name);
    }

    /**
     * Launches services in order, pausing after each one. A service that
     * fails to launch is logged and skipped. Returns the names launched.
     */
    async start(definitions: ServiceDefinition[], startupDelayMs: number): Promise<string[]> {
        const launched: string[] = [];

        for (const definition of definitions) {
            if (this.stopping) {
                break;
            }

            if (await this.launch(definition)) {
                launched.push(definition.name);
            }

            await sleep(startupDelayMs);
        }

        return launched;
    }

    /** Resolves false when the service failed to launch or shutdown began while it was starting. */
    async launch(definition: ServiceDefinition): Promise<boolean> {
        const pending = this.spawnService(definition);
        this.pendingLaunches.add(pending);

        try {
            return await pending;
        } finally {
            this.pendingLaunches.delete(pending);
        }
    }

    private async spawnService(definition: ServiceDefinition): Promise<boolean> {
        const { logger } = this.options;
        const { command, args } = buildLaunchCommand(definition, this.options.repoRoot ?? REPO_ROOT);

        logger.info(`Starting ${definition.name}`, { service: definition.name });

        let child: SupervisedChild;
        try {
            child = this.spawnProcess(command, args, {
                cwd: this.options.repoRoot ?? REPO_ROOT,
                env: this.options.env ?? process.env,
                stdio: ['ignore', 'pipe', 'pipe'],
            });
        } catch (error) {
            logger.error(`Failed to start ${definition.name}`, { service: definition.name, error: errorMessage(error) });
            return false;
        }

        const spawnError = await waitForSpawn(child);
        if (spawnError) {
            logger.error(`Failed to start ${definition.name}`, { service: definition.name, error: spawnError.message });
            return false;
        }

        if (this.stopping) {
            await this.terminate(definition, child);
            return false;
        }

        child.on('error', (error) => {
            logger.error(`${definition.name} process error`, { service: definition.name, error: error.message });
        });

        this.forwardOutput(definition.name, child.stdout);
        this.forwardOutput(definition.name, child.stderr);

        this.services.push({ definition, child, reportedStopped: false });
        logger.info(`${definition.name} started`, { service: definition.name, pid: child.pid ?? null });

        return true;
    }

    /** Reports each service that has exited, once. Returns the names newly reported. */
    checkLiveness(): string[] {
        const stopped: string[] = [];

        for (const service of this.services) {
            if (service.reportedStopped || !hasExited(service.child)) {
                continue;
            }

            service.reportedStopped = true;
            stopped.push(service.definition.name);
            this.options.logger.warn(`${service.definition.name} has stopped unexpectedly`, {
                service: service.definition.name,
                exitCode: service.child.exitCode,
                signal: service.child.signalCode,
            });
        }

        return stopped;
    }

    startMonitoring(pollIntervalMs: number): void {
        if (this.monitorId) {
            return;
        }

        this.monitorId = setInterval(() => {
            this.checkLiveness();
        }, pollIntervalMs);
    }

    stopMonitoring(): void {
        if (this.monitorId) {
            clearInterval(this.monitorId);
            this.monitorId = undefined;
        }
    }

    /** SIGTERM each service, then SIGKILL whatever is still running after the timeout. */
    async shutdown(): Promise<void> {
        const { logger } = this.options;
        this.stopping = true;
        this.stopMonitoring();

        // A launch still waiting for its spawn event terminates its own child.
        await Promise.all(this.pendingLaunches);

        for (const { definition, child } of this.services) {
            if (hasExited(child)) {
                logger.info(`${definition.name} already exited`, { service: definition.name });
                continue;
            }

            await this.terminate(definition, child);
        }
    }

    private async terminate(definition: ServiceDefinition, child: SupervisedChild): Promise<void> {
        const { logger, shutdownTimeoutMs } = this.options;

        logger.info(`Stopping ${definition.name}`, { service: definition.name });
        child.kill('SIGTERM');

        if (await waitForExit(child, shutdownTimeoutMs)) {
            logger.info(`${definition.name} stopped`, { service: definition.name });
            return;
        }

        logger.warn(`Force killing ${definition.name}`, { service: definition.name, timeoutMs: shutdownTimeoutMs });
        child.kill('SIGKILL');
        await waitForExit(child);
        logger.info(`${definition.name} killed`, { service: definition.name });
    }

    private forwardOutput(name: string, stream: Readable | null): void {
        if (!stream) {
            return;
        }

        const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
        lines.on('line', (line) => {
            this.writeLine(`[${name}] ${line}`);
        });
    }
}
