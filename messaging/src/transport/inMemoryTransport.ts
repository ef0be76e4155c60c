/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { AgentDirectoryEntry } from '../directory';
import { Envelope } from '../types/envelope';
import { DeliveryError, errorMessage } from '../utils/errors';
import { MessagingLogger } from '../utils/logger';
import { EnvelopeReceiver, Transport } from './types';

/**
 * Delivers envelopes between agents living in one process. Payloads go
 * through a JSON round trip so receivers see exactly what the wire carries.
 */
export class InMemoryTransport implements Transport {
    private readonly receivers = new Map<string, EnvelopeReceiver>();
    private readonly inFlight = new Set<Promise<void>>();

    constructor(private readonly logger?: MessagingLogger) {}

    register(receiver: EnvelopeReceiver): void {
        this.receivers.set(receiver.address, receiver);
    }

    async deliver(target: AgentDirectoryEntry, envelope: Envelope): Promise<void> {
        const receiver = this.receivers.get(target.address);
        if (!receiver) {
            throw new DeliveryError(`No in-process receiver for ${target.name}`, true, { address: target.address });
        }

        const wireBody: unknown = JSON.parse(JSON.stringify(envelope));
        const accepted = receiver.accept(wireBody, envelope.sender);

        const processing = Promise.resolve()
            .then(() => accepted.process())
            .catch((error: unknown) => {
                this.logger?.error('In-process message handling failed', {
                    target: target.name,
                    schema: envelope.schema,
                    session: envelope.session,
                    error: errorMessage(error),
                });
            })
            .finally(() => {
                this.inFlight.delete(processing);
            });

        this.inFlight.add(processing);
    }

    /** Resolves once every delivered message, including replies it triggered, has been handled. */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled([...this.inFlight]);
        }
    }
}
