import { PaymentResponse } from '@deposit-refund/messaging';

export const SUMMARY_TITLE = 'Security Deposit Refund Process Complete!';

export function formatAmount(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function formatRefundSummary(response: PaymentResponse): string {
  return [
    '',
    SUMMARY_TITLE,
    '='.repeat(50),
    `Policy ID: ${response.policy_id}`,
    `Final Status: ${response.status}`,
    `Amount Refunded: ${formatAmount(response.paid_amount)}`,
    `Transaction ID: ${response.transaction_id}`,
    '',
  ].join('\n');
}
