/**
 * SPDX-License-Identifier: Apache-2.0
 */
import crypto from 'crypto';
import { EnvelopeValidationError, UnsupportedSchemaError } from '../utils/errors';
import { isRecord, isSchemaName, MessageSchemas, SchemaName } from './messages';

export const ENVELOPE_VERSION = 1;

export interface Envelope<S extends SchemaName = SchemaName> {
    version: number;
    sender: string;
    target: string;
    /** Correlation token; replies reuse the session of the message they answer. */
    session: string;
    schema: S;
    payload: MessageSchemas[S];
    sentAt: string;
}

/** An envelope whose frame is checked but whose payload is not yet decoded. */
export interface InboundEnvelope extends Omit<Envelope, 'payload'> {
    payload: unknown;
}

export interface CreateEnvelopeInput<S extends SchemaName> {
    sender: string;
    target: string;
    schema: S;
    payload: MessageSchemas[S];
    session?: string;
    now?: () => Date;
}

export function generateSession(): string {
    return crypto.randomUUID();
}

export function createEnvelope<S extends SchemaName>(input: CreateEnvelopeInput<S>): Envelope<S> {
    const now = input.now ?? (() => new Date());

    return {
        version: ENVELOPE_VERSION,
        sender: input.sender,
        target: input.target,
        session: input.session ?? generateSession(),
        schema: input.schema,
        payload: input.payload,
        sentAt: now().toISOString(),
    };
}

function requireField(record: Record<string, unknown>, field: string): string {
    const value = record[field];
    if (typeof value !== 'string' || !value.trim()) {
        throw new EnvelopeValidationError(`Envelope ${field} must be a non-empty string`, { field });
    }

    return value;
}

export function parseEnvelope(body: unknown): InboundEnvelope {
    if (!isRecord(body)) {
        throw new EnvelopeValidationError('Envelope must be a JSON object');
    }

    if (body.version !== ENVELOPE_VERSION) {
        throw new EnvelopeValidationError(`Unsupported envelope version: ${String(body.version)}`, {
            version: body.version,
        });
    }

    const schema = requireField(body, 'schema');
    if (!isSchemaName(schema)) {
        throw new UnsupportedSchemaError(`Unknown message schema: ${schema}`, { schema });
    }

    return {
        version: ENVELOPE_VERSION,
        sender: requireField(body, 'sender'),
        target: requireField(body, 'target'),
        session: requireField(body, 'session'),
        schema,
        payload: body.payload,
        sentAt: requireField(body, 'sentAt'),
    };
}
