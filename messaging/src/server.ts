/**
 * SPDX-License-Identifier: Apache-2.0
 */
import http from 'http';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { SubmitController } from './api/controller';
import { createAgentRouter } from './api/routes';
import { createEnvelopeAuthMiddleware } from './auth/envelopeAuth';
import { createInMemoryNonceStore, NonceStore } from './auth/inMemoryNonceStore';
import { EnvelopeAuthSettings } from './config/env';
import { AgentDirectory } from './directory';
import { EnvelopeReceiver } from './transport/types';
import { errorMessage } from './utils/errors';
import { MessagingLogger } from './utils/logger';

export interface AgentAppOptions {
    service: string;
    receiver: EnvelopeReceiver;
    directory: AgentDirectory;
    logger: MessagingLogger;
    auth: EnvelopeAuthSettings;
    nonceStore?: NonceStore;
    readinessCheck?: () => Promise<void>;
}

export interface AgentApp {
    app: express.Express;
    nonceStore: NonceStore;
}

export interface RunningAgentServer {
    server: http.Server;
    port: number;
    close: () => Promise<void>;
}

export function createAgentApp(options: AgentAppOptions): AgentApp {
    const nonceStore = options.nonceStore ?? createInMemoryNonceStore();
    const authMiddleware = createEnvelopeAuthMiddleware({
        enabled: options.auth.enabled,
        maxSkewSeconds: options.auth.maxSkewSeconds,
        nonceTtlSeconds: options.auth.nonceTtlSeconds,
        lookupSigner: (agentAddress) => options.directory.resolve(agentAddress),
        consumeNonce: nonceStore.consume,
        logger: options.logger,
    });

    const app = express();

    app.use(helmet());
    app.use(cors());
    app.use(
        express.json({
            verify: (req, _res, buffer) => {
                (req as express.Request & { rawBody?: Buffer }).rawBody = Buffer.from(buffer);
            },
        })
    );

    app.use((req, _res, next) => {
        options.logger.info(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.headers['user-agent'],
        });
        next();
    });

    const controller = new SubmitController(options.receiver, options.logger);
    app.use(
        createAgentRouter(controller, {
            service: options.service,
            authMiddleware,
            readinessCheck: options.readinessCheck,
        })
    );

    app.use((_req, res) => {
        res.status(404).json({
            success: false,
            code: 'NOT_FOUND',
            error: 'Route not found',
        });
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        // body-parser reports malformed JSON as a SyntaxError
        if (error instanceof SyntaxError) {
            res.status(400).json({
                success: false,
                code: 'INVALID_ENVELOPE',
                error: 'Request body is not valid JSON',
            });
            return;
        }

        options.logger.error('Unhandled error', error);
        res.status(500).json({
            success: false,
            code: 'INTERNAL_ERROR',
            error: errorMessage(error) || 'An unexpected error occurred',
        });
    });

    return { app, nonceStore };
}

export async function startAgentServer(
    options: AgentAppOptions & { port: number; host?: string }
): Promise<RunningAgentServer> {
    const { app, nonceStore } = createAgentApp(options);

    const server = await new Promise<http.Server>((resolve, reject) => {
        const listening = app.listen(options.port, options.host ?? '0.0.0.0', () => resolve(listening));
        listening.once('error', reject);
    });

    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : options.port;

    options.logger.info(`${options.service} listening`, { port });

    return {
        server,
        port,
        close: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close((error) => (error ? reject(error) : resolve()));
            });
            await nonceStore.close();
        },
    };
}
