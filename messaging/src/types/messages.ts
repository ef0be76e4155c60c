/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { MessageValidationError } from '../utils/errors';

export const PAYOUT_DECISIONS = ['full_payout', 'deduct_payout'] as const;

export type PayoutDecision = (typeof PAYOUT_DECISIONS)[number];

export type PaymentStatus = 'completed' | 'failed' | 'rejected';

// Field names below are the wire contract between agents.

export interface DamageRequest {
    before_image: string;
    after_image: string;
    claim_amount: number;
    policy_id: string;
}

export interface DamageResponse {
    decision: PayoutDecision;
    approved_amount: number;
    deduction: number;
    policy_id: string;
}

export interface PaymentRequest {
    /** Forwarded from the damage decision; any string is accepted. */
    decision: string;
    approved_amount: number;
    policy_id: string;
}

export interface PaymentResponse {
    policy_id: string;
    decision: string;
    paid_amount: number;
    transaction_id: string;
    status: PaymentStatus;
}

export interface MessageSchemas {
    DamageRequest: DamageRequest;
    DamageResponse: DamageResponse;
    PaymentRequest: PaymentRequest;
    PaymentResponse: PaymentResponse;
}

export type SchemaName = keyof MessageSchemas;

type MessageParsers = {
    [S in SchemaName]: (record: Record<string, unknown>) => MessageSchemas[S];
};

const PAYMENT_STATUSES: PaymentStatus[] = ['completed', 'failed', 'rejected'];

function requireString(record: Record<string, unknown>, field: string, schema: SchemaName): string {
    const value = record[field];
    if (typeof value !== 'string') {
        throw new MessageValidationError(`${schema}.${field} must be a string`, { schema, field });
    }

    return value;
}

function requireNumber(record: Record<string, unknown>, field: string, schema: SchemaName): number {
    const value = record[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new MessageValidationError(`${schema}.${field} must be a number`, { schema, field });
    }

    return value;
}

export function isPayoutDecision(value: string): value is PayoutDecision {
    return PAYOUT_DECISIONS.some((decision) => decision === value);
}

function isPaymentStatus(value: string): value is PaymentStatus {
    return PAYMENT_STATUSES.some((status) => status === value);
}

const MESSAGE_PARSERS: MessageParsers = {
    DamageRequest: (record) => ({
        before_image: requireString(record, 'before_image', 'DamageRequest'),
        after_image: requireString(record, 'after_image', 'DamageRequest'),
        claim_amount: requireNumber(record, 'claim_amount', 'DamageRequest'),
        policy_id: requireString(record, 'policy_id', 'DamageRequest'),
    }),
    DamageResponse: (record) => {
        const decision = requireString(record, 'decision', 'DamageResponse');
        if (!isPayoutDecision(decision)) {
            throw new MessageValidationError(
                `DamageResponse.decision must be one of: ${PAYOUT_DECISIONS.join(', ')}`,
                { schema: 'DamageResponse', field: 'decision' }
            );
        }

        return {
            decision,
            approved_amount: requireNumber(record, 'approved_amount', 'DamageResponse'),
            deduction: requireNumber(record, 'deduction', 'DamageResponse'),
            policy_id: requireString(record, 'policy_id', 'DamageResponse'),
        };
    },
    PaymentRequest: (record) => ({
        decision: requireString(record, 'decision', 'PaymentRequest'),
        approved_amount: requireNumber(record, 'approved_amount', 'PaymentRequest'),
        policy_id: requireString(record, 'policy_id', 'PaymentRequest'),
    }),
    PaymentResponse: (record) => {
        const status = requireString(record, 'status', 'PaymentResponse');
        if (!isPaymentStatus(status)) {
            throw new MessageValidationError(
                `PaymentResponse.status must be one of: ${PAYMENT_STATUSES.join(', ')}`,
                { schema: 'PaymentResponse', field: 'status' }
            );
        }

        return {
            policy_id: requireString(record, 'policy_id', 'PaymentResponse'),
            decision: requireString(record, 'decision', 'PaymentResponse'),
            paid_amount: requireNumber(record, 'paid_amount', 'PaymentResponse'),
            transaction_id: requireString(record, 'transaction_id', 'PaymentResponse'),
            status,
        };
    },
};

export const SCHEMA_NAMES: readonly SchemaName[] = [
    'DamageRequest',
    'DamageResponse',
    'PaymentRequest',
    'PaymentResponse',
];

export function isSchemaName(value: unknown): value is SchemaName {
    return SCHEMA_NAMES.some((schema) => schema === value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes a payload for the given schema. Only shape is checked: amounts may
 * be negative and decisions may be arbitrary text where the schema allows it.
 */
export function parseMessage<S extends SchemaName>(schema: S, payload: unknown): MessageSchemas[S] {
    if (!isRecord(payload)) {
        throw new MessageValidationError(`${schema} payload must be an object`, { schema });
    }

    return MESSAGE_PARSERS[schema](payload);
}
