/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { SubmitController } from './controller';

function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

export interface AgentRouterOptions {
    service: string;
    authMiddleware?: RequestHandler;
    readinessCheck?: () => Promise<void>;
}

export function createAgentRouter(controller: SubmitController, options: AgentRouterOptions): Router {
    const router = Router();

    router.get('/health', (_req, res) => {
        res.json({
            success: true,
            service: options.service,
            status: 'ok',
            timestamp: new Date().toISOString(),
        });
    });

    router.get('/ready', async (_req, res) => {
        try {
            if (options.readinessCheck) {
                await options.readinessCheck();
            }

            res.json({
                success: true,
                service: options.service,
                ready: true,
                timestamp: new Date().toISOString(),
            });
        } catch {
            res.status(503).json({
                success: false,
                service: options.service,
                ready: false,
                error: 'Dependencies not ready',
                timestamp: new Date().toISOString(),
            });
        }
    });

    const submitChain: RequestHandler[] = options.authMiddleware ? [options.authMiddleware] : [];
    router.post('/submit', ...submitChain, asyncHandler((req, res) => controller.submit(req, res)));

    return router;
}
