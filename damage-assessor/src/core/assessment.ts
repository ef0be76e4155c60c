import { DamageRequest, DamageResponse } from '@deposit-refund/messaging';

export const DAMAGE_DEDUCTION_RATE = 0.2;

/**
 * Identical image references mean no damage and a full payout. Anything else
 * keeps a flat share of the claim. Amounts are not range-checked, so a
 * negative claim flows through the same arithmetic.
 */
export function assessDamage(request: DamageRequest): DamageResponse {
    if (request.before_image === request.after_image) {
        return {
            decision: 'full_payout',
            approved_amount: request.claim_amount,
            deduction: 0,
            policy_id: request.policy_id,
        };
    }

    const deduction = request.claim_amount * DAMAGE_DEDUCTION_RATE;

    return {
        decision: 'deduct_payout',
        approved_amount: request.claim_amount - deduction,
        deduction,
        policy_id: request.policy_id,
    };
}
