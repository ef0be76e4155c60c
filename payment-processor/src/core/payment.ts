import { PaymentRequest, PaymentResponse, PaymentStatus } from '@deposit-refund/messaging';

export interface PaymentOutcome {
    paid: boolean;
    status: PaymentStatus;
}

const PAYOUT_OUTCOMES = new Map<string, PaymentOutcome>([
    ['full_payout', { paid: true, status: 'completed' }],
    ['deduct_payout', { paid: true, status: 'completed' }],
    ['error', { paid: false, status: 'failed' }],
]);

const REJECTED: PaymentOutcome = { paid: false, status: 'rejected' };

export function resolvePaymentOutcome(decision: string): PaymentOutcome {
    return PAYOUT_OUTCOMES.get(decision) ?? REJECTED;
}

export function processPayment(request: PaymentRequest, transactionId: string): PaymentResponse {
    const outcome = resolvePaymentOutcome(request.decision);

    return {
        policy_id: request.policy_id,
        decision: request.decision,
        paid_amount: outcome.paid ? request.approved_amount : 0,
        transaction_id: transactionId,
        status: outcome.status,
    };
}
