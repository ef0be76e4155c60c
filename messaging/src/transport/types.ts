/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { AgentDirectoryEntry } from '../directory';
import { Envelope, InboundEnvelope } from '../types/envelope';

export interface Transport {
    deliver(target: AgentDirectoryEntry, envelope: Envelope): Promise<void>;
}

export interface AcceptedMessage {
    envelope: InboundEnvelope;
    /** Runs the handler on the receiving agent's queue. */
    process: () => Promise<void>;
}

export interface EnvelopeReceiver {
    readonly address: string;
    accept(body: unknown, authenticatedSender?: string): AcceptedMessage;
}
