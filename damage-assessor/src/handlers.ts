import { Agent, MessagingLogger } from '@deposit-refund/messaging';
import { assessDamage } from './core/assessment';

export function registerDamageHandlers(agent: Agent, logger: MessagingLogger): void {
    agent.onMessage('DamageRequest', async (ctx, request) => {
        logger.info('Damage assessment requested', {
            policyId: request.policy_id,
            session: ctx.session,
            beforeImage: request.before_image,
            afterImage: request.after_image,
            claimAmount: request.claim_amount,
        });

        const response = assessDamage(request);

        logger.info('Damage assessed', {
            policyId: response.policy_id,
            session: ctx.session,
            decision: response.decision,
            approvedAmount: response.approved_amount,
            deduction: response.deduction,
        });

        await ctx.send(ctx.sender, 'DamageResponse', response);
    });
}
