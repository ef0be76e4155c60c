/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { AgentDirectory } from './directory';
import { AgentIdentity } from './identity';
import { createEnvelope, InboundEnvelope, parseEnvelope } from './types/envelope';
import { MessageSchemas, parseMessage, SchemaName } from './types/messages';
import { AcceptedMessage, EnvelopeReceiver, Transport } from './transport/types';
import {
    EnvelopeValidationError,
    errorMessage,
    UnroutableMessageError,
    UnsupportedSchemaError,
} from './utils/errors';
import { MessagingLogger } from './utils/logger';

export interface SendOptions {
    session?: string;
}

export interface AgentContext {
    readonly name: string;
    readonly address: string;
    readonly logger: MessagingLogger;
    /** Resolves with the session the envelope was sent under. */
    send<S extends SchemaName>(
        target: string,
        schema: S,
        payload: MessageSchemas[S],
        options?: SendOptions
    ): Promise<string>;
}

export interface MessageContext extends AgentContext {
    readonly sender: string;
    readonly session: string;
}

export type MessageHandler<S extends SchemaName> = (
    ctx: MessageContext,
    message: MessageSchemas[S]
) => Promise<void> | void;

export type IntervalHandler = (ctx: AgentContext) => Promise<void> | void;

// Decodes the payload up front and returns the bound handler call.
type RegisteredHandler = (payload: unknown) => (ctx: MessageContext) => Promise<void>;

interface IntervalRegistration {
    periodMs: number;
    handler: IntervalHandler;
    timer?: NodeJS.Timeout;
}

export interface AgentOptions {
    identity: AgentIdentity;
    directory: AgentDirectory;
    transport: Transport;
    logger: MessagingLogger;
}

export class Agent implements EnvelopeReceiver {
    readonly name: string;
    readonly address: string;

    private readonly handlers = new Map<SchemaName, RegisteredHandler>();
    private readonly intervals: IntervalRegistration[] = [];
    private queueTail: Promise<void> = Promise.resolve();
    private isRunning = false;

    constructor(private readonly options: AgentOptions) {
        this.name = options.identity.name;
        this.address = options.identity.address;
    }

    onMessage<S extends SchemaName>(schema: S, handler: MessageHandler<S>): this {
        if (this.handlers.has(schema)) {
            throw new Error(`Handler for ${schema} already registered on ${this.name}`);
        }

        this.handlers.set(schema, (payload) => {
            const message = parseMessage(schema, payload);
            return async (ctx) => {
                await handler(ctx, message);
            };
        });

        return this;
    }

    onInterval(periodMs: number, handler: IntervalHandler): this {
        if (!Number.isFinite(periodMs) || periodMs <= 0) {
            throw new Error('Interval period must be a positive number of milliseconds');
        }

        this.intervals.push({ periodMs, handler });
        return this;
    }

    handles(schema: SchemaName): boolean {
        return this.handlers.has(schema);
    }

    /**
     * Checks the envelope frame synchronously so the caller can answer the
     * sender before the handler runs.
     */
    accept(body: unknown, authenticatedSender?: string): AcceptedMessage {
        const envelope = parseEnvelope(body);

        if (envelope.target !== this.address) {
            throw new UnroutableMessageError(`Envelope target ${envelope.target} is not ${this.name}`, {
                target: envelope.target,
            });
        }

        if (authenticatedSender !== undefined && authenticatedSender !== envelope.sender) {
            throw new EnvelopeValidationError('Envelope sender does not match the authenticated agent', {
                sender: envelope.sender,
            });
        }

        const handler = this.handlers.get(envelope.schema);
        if (!handler) {
            throw new UnsupportedSchemaError(`${this.name} does not handle ${envelope.schema}`, {
                schema: envelope.schema,
            });
        }

        const run = handler(envelope.payload);

        return {
            envelope,
            process: () => this.enqueue(() => this.dispatch(run, envelope)),
        };
    }

    async send<S extends SchemaName>(
        target: string,
        schema: S,
        payload: MessageSchemas[S],
        options: SendOptions = {}
    ): Promise<string> {
        const entry = this.options.directory.require(target);
        const envelope = createEnvelope({
            sender: this.address,
            target,
            schema,
            payload,
            session: options.session,
        });

        this.options.logger.info(`Sending ${schema} to ${entry.name}`, {
            target: entry.address,
            session: envelope.session,
        });

        await this.options.transport.deliver(entry, envelope);
        return envelope.session;
    }

    start(): void {
        if (this.isRunning) {
            this.options.logger.warn(`${this.name} already running`);
            return;
        }

        this.isRunning = true;

        // Each interval handler fires once at start, then every period.
        for (const registration of this.intervals) {
            void this.tick(registration);
            registration.timer = setInterval(() => {
                void this.tick(registration);
            }, registration.periodMs);
        }

        this.options.logger.info(`${this.name} started`, {
            address: this.address,
            schemas: [...this.handlers.keys()],
            intervals: this.intervals.map((registration) => registration.periodMs),
        });
    }

    stop(): void {
        if (!this.isRunning) {
            return;
        }

        this.isRunning = false;

        for (const registration of this.intervals) {
            if (registration.timer) {
                clearInterval(registration.timer);
                registration.timer = undefined;
            }
        }

        this.options.logger.info(`${this.name} stopped`);
    }

    /** Runs every interval handler once, in registration order, on the agent queue. */
    async runIntervals(): Promise<void> {
        for (const registration of this.intervals) {
            await this.tick(registration);
        }
    }

    private tick(registration: IntervalRegistration): Promise<void> {
        return this.enqueue(async () => {
            try {
                await registration.handler(this.createContext());
            } catch (error) {
                this.options.logger.error(`${this.name} interval handler failed`, {
                    periodMs: registration.periodMs,
                    error: errorMessage(error),
                });
            }
        });
    }

    private async dispatch(
        run: (ctx: MessageContext) => Promise<void>,
        envelope: InboundEnvelope
    ): Promise<void> {
        try {
            await run(this.createMessageContext(envelope));
        } catch (error) {
            this.options.logger.error(`${this.name} failed to handle ${envelope.schema}`, {
                sender: envelope.sender,
                session: envelope.session,
                error: errorMessage(error),
            });
        }
    }

    // One message or tick at a time per agent.
    private enqueue(task: () => Promise<void>): Promise<void> {
        const result = this.queueTail.then(task);
        this.queueTail = result.catch((error: unknown) => {
            this.options.logger.error(`${this.name} queue task failed`, { error: errorMessage(error) });
        });
        return result;
    }

    private createContext(): AgentContext {
        return {
            name: this.name,
            address: this.address,
            logger: this.options.logger,
            send: (target, schema, payload, options) => this.send(target, schema, payload, options),
        };
    }

    private createMessageContext(envelope: InboundEnvelope): MessageContext {
        return {
            name: this.name,
            address: this.address,
            logger: this.options.logger,
            sender: envelope.sender,
            session: envelope.session,
            send: (target, schema, payload, options) =>
                this.send(target, schema, payload, { session: options?.session ?? envelope.session }),
        };
    }
}
