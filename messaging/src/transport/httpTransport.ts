/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { createEnvelopeAuthHeaders, EnvelopeSigner } from '../auth/envelopeAuth';
import { AgentDirectoryEntry } from '../directory';
import { Envelope } from '../types/envelope';
import { isRecord } from '../types/messages';
import { DeliveryError, errorMessage } from '../utils/errors';
import { MessagingLogger } from '../utils/logger';
import { fetchWithTimeout } from './fetchWithTimeout';
import { Transport } from './types';

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_DELAY_MS = 250;
const DEFAULT_MAX_RETRY_DELAY_MS = 2000;
const MAX_RETRY_ATTEMPTS_CAP = 5;

export interface HttpTransportOptions {
    signer: EnvelopeSigner;
    logger: MessagingLogger;
    requestTimeoutMs?: number;
    /** Extra attempts after the first; 0 delivers exactly once. */
    retryAttempts?: number;
    retryDelayMs?: number;
    maxRetryDelayMs?: number;
}

async function readErrorBody(response: Response): Promise<string | undefined> {
    try {
        const body: unknown = await response.json();
        if (isRecord(body) && typeof body.error === 'string') {
            return body.error;
        }
    } catch {
        return undefined;
    }

    return undefined;
}

export function retryDelayForAttempt(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    const exponent = Math.max(0, attempt - 1);
    const delay = baseDelayMs * Math.pow(2, exponent);
    return Math.min(delay, maxDelayMs);
}

async function sleep(ms: number): Promise<void> {
    if (ms <= 0) {
        return;
    }

    await new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpTransport implements Transport {
    private readonly timeoutMs: number;
    private readonly retryAttempts: number;
    private readonly baseDelayMs: number;
    private readonly maxDelayMs: number;

    constructor(private readonly options: HttpTransportOptions) {
        this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.retryAttempts = Math.min(Math.max(0, Math.trunc(options.retryAttempts ?? 0)), MAX_RETRY_ATTEMPTS_CAP);
        this.baseDelayMs = Math.max(0, Math.trunc(options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS));
        this.maxDelayMs = Math.max(this.baseDelayMs, Math.trunc(options.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS));
    }

    async deliver(target: AgentDirectoryEntry, envelope: Envelope): Promise<void> {
        const totalAttempts = this.retryAttempts + 1;
        let lastError: DeliveryError | undefined;

        for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
            try {
                await this.post(target, envelope);
                return;
            } catch (error) {
                lastError = error instanceof DeliveryError
                    ? error
                    : new DeliveryError(errorMessage(error), false, { endpoint: target.endpoint });

                this.options.logger.warn('Envelope delivery failed', {
                    target: target.name,
                    endpoint: target.endpoint,
                    schema: envelope.schema,
                    session: envelope.session,
                    attempt,
                    totalAttempts,
                    terminal: lastError.isTerminal,
                    error: lastError.message,
                });

                if (lastError.isTerminal) {
                    break;
                }
            }

            if (attempt < totalAttempts) {
                await sleep(retryDelayForAttempt(attempt, this.baseDelayMs, this.maxDelayMs));
            }
        }

        throw lastError ?? new DeliveryError(`Delivery to ${target.endpoint} failed`);
    }

    private async post(target: AgentDirectoryEntry, envelope: Envelope): Promise<void> {
        const url = new URL(target.endpoint);
        const body = JSON.stringify(envelope);
        const authHeaders = createEnvelopeAuthHeaders({
            agentAddress: this.options.signer.address,
            signingSecret: this.options.signer.signingSecret,
            method: 'POST',
            path: url.pathname,
            query: url.search,
            body,
        });

        const response = await fetchWithTimeout(
            target.endpoint,
            {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    ...authHeaders,
                },
                body,
            },
            this.timeoutMs
        );

        if (response.ok) {
            return;
        }

        const detail = await readErrorBody(response);
        const isTerminal = response.status >= 400 && response.status < 500;
        throw new DeliveryError(
            detail || `Delivery to ${target.endpoint} failed (${response.status})`,
            isTerminal,
            { endpoint: target.endpoint, status: response.status }
        );
    }
}
