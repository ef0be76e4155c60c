import { Agent, AuditLogger } from '@deposit-refund/messaging';
import { processPayment } from './core/payment';
import { generateTransactionId, RandomInt } from './core/transaction';

export interface PaymentHandlerOptions {
    randomInt?: RandomInt;
}

export function registerPaymentHandlers(agent: Agent, logger: AuditLogger, options: PaymentHandlerOptions = {}): void {
    agent.onMessage('PaymentRequest', async (ctx, request) => {
        logger.info('Payment requested', {
            policyId: request.policy_id,
            session: ctx.session,
            decision: request.decision,
            approvedAmount: request.approved_amount,
        });

        const response = processPayment(request, generateTransactionId(options.randomInt));

        logger.audit('refund_processed', response.policy_id, {
            session: ctx.session,
            status: response.status,
            paidAmount: response.paid_amount,
            transactionId: response.transaction_id,
        });

        await ctx.send(ctx.sender, 'PaymentResponse', response);
    });
}
