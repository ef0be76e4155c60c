/**
 * SPDX-License-Identifier: Apache-2.0
 */
export * from './agent';
export * from './api/controller';
export * from './api/routes';
export * from './auth/envelopeAuth';
export * from './auth/inMemoryNonceStore';
export * from './config/env';
export * from './directory';
export * from './identity';
export * from './runtime';
export * from './server';
export * from './transport/fetchWithTimeout';
export * from './transport/httpTransport';
export * from './transport/inMemoryTransport';
export * from './transport/types';
export * from './types/envelope';
export * from './types/messages';
export * from './utils/errors';
export * from './utils/logger';
