/**
 * SPDX-License-Identifier: Apache-2.0
 */
export class MessagingError extends Error {
    constructor(
        message: string,
        public code: string,
        public statusCode: number = 500,
        public context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'MessagingError';
    }
}

export class MessageValidationError extends MessagingError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_MESSAGE', 400, context);
        this.name = 'MessageValidationError';
    }
}

export class EnvelopeValidationError extends MessagingError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_ENVELOPE', 400, context);
        this.name = 'EnvelopeValidationError';
    }
}

export class UnroutableMessageError extends MessagingError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'UNROUTABLE_MESSAGE', 400, context);
        this.name = 'UnroutableMessageError';
    }
}

export class UnsupportedSchemaError extends MessagingError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'UNSUPPORTED_SCHEMA', 400, context);
        this.name = 'UnsupportedSchemaError';
    }
}

export class UnknownAgentError extends MessagingError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'UNKNOWN_AGENT', 404, context);
        this.name = 'UnknownAgentError';
    }
}

export class DeliveryError extends MessagingError {
    constructor(
        message: string,
        public isTerminal: boolean = false,
        context?: Record<string, unknown>
    ) {
        super(message, 'DELIVERY_FAILED', 502, context);
        this.name = 'DeliveryError';
    }
}

export class DeliveryTimeoutError extends DeliveryError {
    constructor(endpoint: string, timeoutMs: number) {
        super(`Delivery to ${endpoint} timed out after ${timeoutMs}ms`, false, { endpoint, timeoutMs });
        this.name = 'DeliveryTimeoutError';
    }
}

export class ConfigurationError extends MessagingError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR', 500);
        this.name = 'ConfigurationError';
    }
}

// Errors thrown from another realm (Jest's sandbox, vm contexts) fail instanceof Error.
export function errorMessage(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }

    return String(error);
}
