import {
  Agent,
  AgentContext,
  AuditLogger,
  DamageRequest,
  DamageResponse,
  errorMessage,
  generateSession,
  MessageContext,
  PaymentResponse,
} from '@deposit-refund/messaging';
import { formatRefundSummary } from './summary';
import { RefundWorkflowRegistry } from './workflow';

export interface RefundPeers {
  damageAssessor: string;
  paymentProcessor: string;
}

export interface RefundOrchestratorOptions {
  peers: RefundPeers;
  claim: DamageRequest;
  logger: AuditLogger;
  /** 0 keeps a workflow waiting forever for a lost response. */
  responseTimeoutMs?: number;
  registry?: RefundWorkflowRegistry;
  createSession?: () => string;
  writeSummary?: (text: string) => void;
}

export class RefundOrchestrator {
  readonly registry: RefundWorkflowRegistry;
  private readonly responseTimeoutMs: number;
  private readonly createSession: () => string;
  private readonly writeSummary: (text: string) => void;

  constructor(private readonly options: RefundOrchestratorOptions) {
    this.registry = options.registry ?? new RefundWorkflowRegistry();
    this.responseTimeoutMs = options.responseTimeoutMs ?? 0;
    this.createSession = options.createSession ?? generateSession;
    this.writeSummary = options.writeSummary ?? ((text) => {
      process.stdout.write(text);
    });
  }

  register(agent: Agent, intervalMs: number): void {
    agent.onInterval(intervalMs, (ctx) => this.tick(ctx));
    agent.onMessage('DamageResponse', (ctx, response) => this.onDamageResponse(ctx, response));
    agent.onMessage('PaymentResponse', (ctx, response) => this.onPaymentResponse(ctx, response));
  }

  async tick(ctx: AgentContext): Promise<void> {
    const { logger, claim, peers } = this.options;

    if (this.responseTimeoutMs > 0) {
      for (const workflow of this.registry.expire(this.responseTimeoutMs)) {
        logger.error('Refund workflow timed out waiting for a response', {
          policyId: workflow.policyId,
          session: workflow.session,
          timeoutMs: this.responseTimeoutMs,
        });
      }
    }

    if (!this.registry.canStart(claim.policy_id)) {
      logger.info('Refund workflow still in flight, skipping tick', {
        policyId: claim.policy_id,
        state: this.registry.stateOf(claim.policy_id),
      });
      return;
    }

    const session = this.createSession();
    const workflow = this.registry.begin(claim, session);

    logger.info('Starting security deposit refund', {
      policyId: claim.policy_id,
      session,
      cycle: workflow.cycles,
      claimAmount: claim.claim_amount,
    });

    try {
      await ctx.send(peers.damageAssessor, 'DamageRequest', claim, { session });
    } catch (error) {
      logger.error('Damage request delivery failed', {
        policyId: claim.policy_id,
        session,
        error: errorMessage(error),
      });
    }
  }

  async onDamageResponse(ctx: MessageContext, response: DamageResponse): Promise<void> {
    const { logger, peers } = this.options;

    if (ctx.sender !== peers.damageAssessor) {
      logger.warn('Ignoring DamageResponse from unexpected sender', {
        policyId: response.policy_id,
        session: ctx.session,
        sender: ctx.sender,
      });
      return;
    }

    const result = this.registry.recordDamage(response, ctx.session);
    if (!result.accepted) {
      logger.warn('Ignoring DamageResponse', {
        policyId: response.policy_id,
        session: ctx.session,
        reason: result.reason,
        state: result.workflow?.state ?? null,
      });
      return;
    }

    logger.info('Damage assessment received', {
      policyId: response.policy_id,
      session: ctx.session,
      decision: response.decision,
      approvedAmount: response.approved_amount,
      deduction: response.deduction,
    });
    logger.audit('damage_assessed', response.policy_id, {
      session: ctx.session,
      decision: response.decision,
      approvedAmount: response.approved_amount,
    });

    try {
      await ctx.send(
        peers.paymentProcessor,
        'PaymentRequest',
        {
          decision: response.decision,
          approved_amount: response.approved_amount,
          policy_id: response.policy_id,
        },
        { session: ctx.session }
      );
    } catch (error) {
      logger.error('Payment request delivery failed', {
        policyId: response.policy_id,
        session: ctx.session,
        error: errorMessage(error),
      });
    }
  }

  async onPaymentResponse(ctx: MessageContext, response: PaymentResponse): Promise<void> {
    const { logger, peers } = this.options;

    if (ctx.sender !== peers.paymentProcessor) {
      logger.warn('Ignoring PaymentResponse from unexpected sender', {
        policyId: response.policy_id,
        session: ctx.session,
        sender: ctx.sender,
      });
      return;
    }

    const result = this.registry.recordPayment(response, ctx.session);
    if (!result.accepted) {
      logger.warn('Ignoring PaymentResponse', {
        policyId: response.policy_id,
        session: ctx.session,
        reason: result.reason,
        state: result.workflow?.state ?? null,
      });
      return;
    }

    logger.info('Payment processing completed', {
      policyId: response.policy_id,
      session: ctx.session,
      status: response.status,
      paidAmount: response.paid_amount,
      transactionId: response.transaction_id,
    });
    logger.audit('refund_completed', response.policy_id, {
      session: ctx.session,
      status: response.status,
      paidAmount: response.paid_amount,
      transactionId: response.transaction_id,
    });

    this.writeSummary(formatRefundSummary(response));
  }
}
