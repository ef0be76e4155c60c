/**
 * SPDX-License-Identifier: Apache-2.0
 */
import crypto from 'crypto';
import { NextFunction, Request, Response } from 'express';
import { MessagingLogger } from '../utils/logger';

const SIGNATURE_HEX_REGEX = /^[a-f0-9]{64}$/i;
const ADDRESS_MAX_LENGTH = 128;
const NONCE_MAX_LENGTH = 255;

export const AGENT_ADDRESS_HEADER = 'X-Agent-Address';
export const TIMESTAMP_HEADER = 'X-Timestamp';
export const NONCE_HEADER = 'X-Nonce';
export const SIGNATURE_HEADER = 'X-Signature';

export interface EnvelopeAuthHeaders {
    'X-Agent-Address': string;
    'X-Timestamp': string;
    'X-Nonce': string;
    'X-Signature': string;
}

export interface EnvelopeSignInput {
    agentAddress: string;
    signingSecret: string;
    method: string;
    path: string;
    query?: string;
    body?: string | Buffer | null;
    timestamp?: number;
    nonce?: string;
}

export interface CanonicalRequestParts {
    method: string;
    path: string;
    query: string;
    bodySha256: string;
    timestamp: string;
    nonce: string;
}

export interface EnvelopeSigner {
    address: string;
    signingSecret: string;
}

export interface EnvelopeAuthContext {
    agentAddress: string;
}

export interface EnvelopeAuthMiddlewareOptions {
    enabled: boolean;
    maxSkewSeconds: number;
    nonceTtlSeconds: number;
    nowSeconds?: () => number;
    lookupSigner: (agentAddress: string) => EnvelopeSigner | undefined;
    consumeNonce: (agentAddress: string, nonce: string, ttlSeconds: number) => Promise<boolean>;
    logger?: MessagingLogger;
}

export interface AuthenticatedRequest extends Request {
    rawBody?: Buffer;
    envelopeAuth?: EnvelopeAuthContext;
}

function bodyToBuffer(body: EnvelopeSignInput['body']): Buffer {
    if (body === undefined || body === null) {
        return Buffer.alloc(0);
    }

    if (Buffer.isBuffer(body)) {
        return body;
    }

    return Buffer.from(body);
}

function bodyHash(rawBody: Buffer | undefined): string {
    return crypto.createHash('sha256').update(rawBody ?? Buffer.alloc(0)).digest('hex');
}

function normalizeQuery(query: string | undefined): string {
    if (!query) {
        return '';
    }

    return query.startsWith('?') ? query.slice(1) : query;
}

function timingSafeHexEquals(a: string, b: string): boolean {
    const normalizedA = a.trim().toLowerCase();
    const normalizedB = b.trim().toLowerCase();

    if (!SIGNATURE_HEX_REGEX.test(normalizedA) || !SIGNATURE_HEX_REGEX.test(normalizedB)) {
        return false;
    }

    const aBuffer = Buffer.from(normalizedA, 'hex');
    const bBuffer = Buffer.from(normalizedB, 'hex');

    if (aBuffer.length !== bBuffer.length) {
        return false;
    }

    return crypto.timingSafeEqual(aBuffer, bBuffer);
}

function requestPathAndQuery(req: Request): { path: string; query: string } {
    const url = req.originalUrl;
    const separatorIndex = url.indexOf('?');

    if (separatorIndex === -1) {
        return { path: url, query: '' };
    }

    return {
        path: url.slice(0, separatorIndex),
        query: url.slice(separatorIndex + 1),
    };
}

function headerValue(req: Request, headerName: string): string | undefined {
    const value = req.header(headerName);
    if (value && value.trim()) {
        return value.trim();
    }

    return undefined;
}

export function buildEnvelopeCanonicalString(parts: CanonicalRequestParts): string {
    return [parts.method, parts.path, parts.query, parts.bodySha256, parts.timestamp, parts.nonce].join('\n');
}

export function signEnvelopeCanonicalString(secret: string, canonicalString: string): string {
    return crypto.createHmac('sha256', secret).update(canonicalString).digest('hex');
}

export function createEnvelopeAuthHeaders(input: EnvelopeSignInput): EnvelopeAuthHeaders {
    const timestamp = String(input.timestamp ?? Math.floor(Date.now() / 1000));
    const nonce = input.nonce || crypto.randomBytes(16).toString('hex');
    const bodySha256 = crypto.createHash('sha256').update(bodyToBuffer(input.body)).digest('hex');

    const canonicalString = buildEnvelopeCanonicalString({
        method: input.method.toUpperCase(),
        path: input.path,
        query: normalizeQuery(input.query),
        bodySha256,
        timestamp,
        nonce,
    });

    return {
        'X-Agent-Address': input.agentAddress,
        'X-Timestamp': timestamp,
        'X-Nonce': nonce,
        'X-Signature': signEnvelopeCanonicalString(input.signingSecret, canonicalString),
    };
}

export function createEnvelopeAuthMiddleware(options: EnvelopeAuthMiddlewareOptions) {
    const nowSeconds = options.nowSeconds || (() => Math.floor(Date.now() / 1000));

    const reject = (res: Response, statusCode: 401 | 503, code: string, message: string, req: Request): void => {
        options.logger?.warn('Envelope authentication rejected', {
            code,
            ip: req.ip,
            agentAddress: req.header(AGENT_ADDRESS_HEADER) ?? null,
        });

        res.status(statusCode).json({
            success: false,
            code,
            error: message,
        });
    };

    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        if (!options.enabled) {
            next();
            return;
        }

        const agentAddress = headerValue(req, AGENT_ADDRESS_HEADER);
        const timestamp = headerValue(req, TIMESTAMP_HEADER);
        const nonce = headerValue(req, NONCE_HEADER);
        const signature = headerValue(req, SIGNATURE_HEADER);

        if (!agentAddress || !timestamp || !signature) {
            reject(res, 401, 'AUTH_MISSING_HEADERS', 'Missing authentication headers', req);
            return;
        }

        if (!/^\d+$/.test(timestamp)) {
            reject(res, 401, 'AUTH_INVALID_TIMESTAMP', 'Invalid timestamp format', req);
            return;
        }

        const timestampSeconds = Number.parseInt(timestamp, 10);
        if (!Number.isSafeInteger(timestampSeconds) || timestampSeconds <= 0) {
            reject(res, 401, 'AUTH_INVALID_TIMESTAMP', 'Invalid timestamp format', req);
            return;
        }

        const skew = Math.abs(nowSeconds() - timestampSeconds);
        if (skew > options.maxSkewSeconds) {
            reject(res, 401, 'AUTH_TIMESTAMP_SKEW', 'Timestamp outside allowed skew window', req);
            return;
        }

        const signer = agentAddress.length > ADDRESS_MAX_LENGTH ? undefined : options.lookupSigner(agentAddress);
        if (!signer) {
            reject(res, 401, 'AUTH_UNKNOWN_AGENT', 'Unknown agent address', req);
            return;
        }

        if (!nonce || nonce.length > NONCE_MAX_LENGTH) {
            reject(res, 401, 'AUTH_INVALID_NONCE', 'Invalid nonce format', req);
            return;
        }

        const { path, query } = requestPathAndQuery(req);
        const canonicalString = buildEnvelopeCanonicalString({
            method: req.method.toUpperCase(),
            path,
            query,
            bodySha256: bodyHash((req as AuthenticatedRequest).rawBody),
            timestamp,
            nonce,
        });

        const expectedSignature = signEnvelopeCanonicalString(signer.signingSecret, canonicalString);
        if (!timingSafeHexEquals(signature, expectedSignature)) {
            reject(res, 401, 'AUTH_INVALID_SIGNATURE', 'Invalid signature', req);
            return;
        }

        try {
            const accepted = await options.consumeNonce(signer.address, nonce, options.nonceTtlSeconds);
            if (!accepted) {
                reject(res, 401, 'AUTH_NONCE_REPLAY', 'Replay detected for nonce', req);
                return;
            }
        } catch {
            reject(res, 503, 'AUTH_UNAVAILABLE', 'Authentication nonce store unavailable', req);
            return;
        }

        (req as AuthenticatedRequest).envelopeAuth = {
            agentAddress: signer.address,
        };

        next();
    };
}
