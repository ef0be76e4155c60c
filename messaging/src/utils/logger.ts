/**
 * SPDX-License-Identifier: Apache-2.0
 */
export interface LogMeta {
    policyId?: string | null;
    session?: string | null;
    [key: string]: unknown;
}

/**
 * Minimal logging surface accepted by the runtime, so services can pass
 * their own Logger and tests can pass jest mocks.
 */
export interface MessagingLogger {
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, metaOrError?: unknown): void;
}

export interface AuditLogger extends MessagingLogger {
    audit(action: string, policyId: string, result: Record<string, unknown>): void;
}

function normalizeErrorMeta(metaOrError?: unknown): LogMeta | undefined {
    if (!metaOrError) {
        return undefined;
    }

    if (metaOrError instanceof Error) {
        return {
            error: metaOrError.message,
            stack: metaOrError.stack,
        };
    }

    if (typeof metaOrError === 'object') {
        return { ...metaOrError };
    }

    return {
        error: String(metaOrError),
    };
}

export class Logger implements AuditLogger {
    constructor(private readonly service: string) {}

    private baseContext(meta?: LogMeta): Record<string, unknown> {
        return {
            service: this.service,
            env: process.env.NODE_ENV || 'development',
            policyId: meta?.policyId ?? null,
            session: meta?.session ?? null,
            ...meta,
        };
    }

    private formatTimestamp(): string {
        return new Date().toISOString();
    }

    info(message: string, meta?: LogMeta): void {
        console.log(JSON.stringify({
            level: 'info',
            timestamp: this.formatTimestamp(),
            message,
            ...this.baseContext(meta),
        }));
    }

    warn(message: string, meta?: LogMeta): void {
        console.warn(JSON.stringify({
            level: 'warn',
            timestamp: this.formatTimestamp(),
            message,
            ...this.baseContext(meta),
        }));
    }

    error(message: string, metaOrError?: unknown): void {
        console.error(JSON.stringify({
            level: 'error',
            timestamp: this.formatTimestamp(),
            message,
            ...this.baseContext(normalizeErrorMeta(metaOrError)),
        }));
    }

    audit(action: string, policyId: string, result: Record<string, unknown>): void {
        console.log(JSON.stringify({
            level: 'audit',
            timestamp: this.formatTimestamp(),
            action,
            ...this.baseContext({
                policyId,
                ...result,
            }),
        }));
    }
}
