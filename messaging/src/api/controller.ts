/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { Request, Response } from 'express';
import { AuthenticatedRequest } from '../auth/envelopeAuth';
import { AcceptedMessage, EnvelopeReceiver } from '../transport/types';
import { errorMessage, MessagingError } from '../utils/errors';
import { MessagingLogger } from '../utils/logger';

export interface SubmitAccepted {
    success: true;
    session: string;
}

export interface SubmitRejected {
    success: false;
    code: string;
    error: string;
}

export class SubmitController {
    constructor(
        private readonly receiver: EnvelopeReceiver,
        private readonly logger: MessagingLogger
    ) {}

    async submit(req: Request, res: Response<SubmitAccepted | SubmitRejected>): Promise<void> {
        const authenticatedSender = (req as AuthenticatedRequest).envelopeAuth?.agentAddress;

        let accepted: AcceptedMessage;
        try {
            accepted = this.receiver.accept(req.body, authenticatedSender);
        } catch (error) {
            if (error instanceof MessagingError) {
                this.logger.warn('Envelope rejected', {
                    code: error.code,
                    error: error.message,
                    ...error.context,
                });
                res.status(error.statusCode).json({
                    success: false,
                    code: error.code,
                    error: error.message,
                });
                return;
            }

            throw error;
        }

        res.status(202).json({
            success: true,
            session: accepted.envelope.session,
        });

        try {
            await accepted.process();
        } catch (error) {
            this.logger.error('Envelope processing failed', {
                schema: accepted.envelope.schema,
                session: accepted.envelope.session,
                error: errorMessage(error),
            });
        }
    }
}
