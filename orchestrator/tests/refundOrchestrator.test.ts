import { AgentContext, AuditLogger, DamageRequest, MessageContext } from '@deposit-refund/messaging';
import { RefundOrchestrator } from '../src/core/refund-orchestrator';
import { RefundWorkflowRegistry } from '../src/core/workflow';

const ASSESSOR = 'agent1qassessor';
const PROCESSOR = 'agent1qprocessor';

const claim: DamageRequest = {
  before_image: 'https://example.com/before.jpg',
  after_image: 'https://example.com/after.jpg',
  claim_amount: 1000,
  policy_id: 'POL-12345',
};

const damage = { decision: 'deduct_payout' as const, approved_amount: 800, deduction: 200, policy_id: 'POL-12345' };
const payment = {
  policy_id: 'POL-12345',
  decision: 'deduct_payout',
  paid_amount: 800,
  transaction_id: 'TXN_123456',
  status: 'completed' as const,
};

function setup(options: { responseTimeoutMs?: number; now?: () => number } = {}) {
  const logger: jest.Mocked<AuditLogger> = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), audit: jest.fn() };
  const send = jest.fn().mockResolvedValue('ignored');
  const writeSummary = jest.fn();
  let sessionCounter = 0;

  const orchestrator = new RefundOrchestrator({
    peers: { damageAssessor: ASSESSOR, paymentProcessor: PROCESSOR },
    claim,
    logger,
    responseTimeoutMs: options.responseTimeoutMs,
    registry: new RefundWorkflowRegistry(options.now),
    createSession: () => {
      sessionCounter += 1;
      return `session-${sessionCounter}`;
    },
    writeSummary,
  });

  const ctx: AgentContext = { name: 'orchestrator', address: 'agent1qorchestrator', logger, send };
  const reply = (sender: string, session: string): MessageContext => ({ ...ctx, sender, session });

  return { orchestrator, logger, send, writeSummary, ctx, reply };
}

describe('RefundOrchestrator', () => {
  test('a tick sends the demo claim under a fresh session', async () => {
    const { orchestrator, send, ctx } = setup();

    await orchestrator.tick(ctx);

    expect(send).toHaveBeenCalledWith(ASSESSOR, 'DamageRequest', claim, { session: 'session-1' });
    expect(orchestrator.registry.stateOf('POL-12345')).toBe('AwaitingDamage');
  });

  test('ticks are skipped while the workflow is in flight', async () => {
    const { orchestrator, send, logger, ctx } = setup();

    await orchestrator.tick(ctx);
    await orchestrator.tick(ctx);

    expect(send).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith('Refund workflow still in flight, skipping tick', {
      policyId: 'POL-12345',
      state: 'AwaitingDamage',
    });
  });

  test('a damage response is forwarded to the payment processor on the same session', async () => {
    const { orchestrator, send, ctx, reply } = setup();
    await orchestrator.tick(ctx);

    await orchestrator.onDamageResponse(reply(ASSESSOR, 'session-1'), damage);

    expect(send).toHaveBeenLastCalledWith(
      PROCESSOR,
      'PaymentRequest',
      { decision: 'deduct_payout', approved_amount: 800, policy_id: 'POL-12345' },
      { session: 'session-1' }
    );
    expect(orchestrator.registry.stateOf('POL-12345')).toBe('AwaitingPayment');
  });

  test('a payment response completes the workflow and prints the summary', async () => {
    const { orchestrator, writeSummary, logger, ctx, reply } = setup();
    await orchestrator.tick(ctx);
    await orchestrator.onDamageResponse(reply(ASSESSOR, 'session-1'), damage);

    await orchestrator.onPaymentResponse(reply(PROCESSOR, 'session-1'), payment);

    expect(orchestrator.registry.stateOf('POL-12345')).toBe('Done');
    expect(writeSummary).toHaveBeenCalledTimes(1);
    expect(writeSummary.mock.calls[0][0]).toContain('Amount Refunded: $800.00');
    expect(logger.audit).toHaveBeenCalledWith('refund_completed', 'POL-12345', {
      session: 'session-1',
      status: 'completed',
      paidAmount: 800,
      transactionId: 'TXN_123456',
    });
  });

  test('the next tick after Done starts a new cycle', async () => {
    const { orchestrator, send, ctx, reply } = setup();
    await orchestrator.tick(ctx);
    await orchestrator.onDamageResponse(reply(ASSESSOR, 'session-1'), damage);
    await orchestrator.onPaymentResponse(reply(PROCESSOR, 'session-1'), payment);

    await orchestrator.tick(ctx);

    expect(send).toHaveBeenLastCalledWith(ASSESSOR, 'DamageRequest', claim, { session: 'session-2' });
    expect(orchestrator.registry.get('POL-12345')?.cycles).toBe(2);
  });

  test('responses on a stale session are ignored', async () => {
    const { orchestrator, send, logger, ctx, reply } = setup();
    await orchestrator.tick(ctx);

    await orchestrator.onDamageResponse(reply(ASSESSOR, 'session-0'), damage);

    expect(send).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Ignoring DamageResponse', {
      policyId: 'POL-12345',
      session: 'session-0',
      reason: 'stale_session',
      state: 'AwaitingDamage',
    });
  });

  test('responses from an unexpected sender are ignored', async () => {
    const { orchestrator, logger, ctx, reply } = setup();
    await orchestrator.tick(ctx);

    await orchestrator.onDamageResponse(reply(PROCESSOR, 'session-1'), damage);

    expect(orchestrator.registry.stateOf('POL-12345')).toBe('AwaitingDamage');
    expect(logger.warn).toHaveBeenCalledWith('Ignoring DamageResponse from unexpected sender', {
      policyId: 'POL-12345',
      session: 'session-1',
      sender: PROCESSOR,
    });
  });

  test('a payment response before the damage step is ignored', async () => {
    const { orchestrator, writeSummary, logger, ctx, reply } = setup();
    await orchestrator.tick(ctx);

    await orchestrator.onPaymentResponse(reply(PROCESSOR, 'session-1'), payment);

    expect(writeSummary).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('Ignoring PaymentResponse', {
      policyId: 'POL-12345',
      session: 'session-1',
      reason: 'unexpected_state',
      state: 'AwaitingDamage',
    });
  });

  test('responses for an unknown policy are ignored', async () => {
    const { orchestrator, logger, reply } = setup();

    await orchestrator.onDamageResponse(reply(ASSESSOR, 'session-1'), { ...damage, policy_id: 'POL-9' });

    expect(logger.warn).toHaveBeenCalledWith('Ignoring DamageResponse', {
      policyId: 'POL-9',
      session: 'session-1',
      reason: 'unknown_policy',
      state: null,
    });
  });

  test('a failed delivery is logged and leaves the workflow waiting', async () => {
    const { orchestrator, send, logger, ctx } = setup();
    send.mockRejectedValueOnce(new Error('Delivery to http://localhost:8000/submit timed out after 5000ms'));

    await orchestrator.tick(ctx);

    expect(logger.error).toHaveBeenCalledWith('Damage request delivery failed', {
      policyId: 'POL-12345',
      session: 'session-1',
      error: 'Delivery to http://localhost:8000/submit timed out after 5000ms',
    });
    expect(orchestrator.registry.stateOf('POL-12345')).toBe('AwaitingDamage');
  });

  describe('response timeout', () => {
    test('disabled by default, so a lost response stalls the workflow', async () => {
      let now = 0;
      const { orchestrator, send, ctx } = setup({ now: () => now });
      await orchestrator.tick(ctx);

      now = 3_600_000;
      await orchestrator.tick(ctx);

      expect(send).toHaveBeenCalledTimes(1);
      expect(orchestrator.registry.stateOf('POL-12345')).toBe('AwaitingDamage');
    });

    test('when set, a stalled workflow times out and the same tick restarts it', async () => {
      let now = 0;
      const { orchestrator, send, logger, ctx } = setup({ responseTimeoutMs: 5000, now: () => now });
      await orchestrator.tick(ctx);

      now = 10_000;
      await orchestrator.tick(ctx);

      expect(logger.error).toHaveBeenCalledWith('Refund workflow timed out waiting for a response', {
        policyId: 'POL-12345',
        session: 'session-1',
        timeoutMs: 5000,
      });
      expect(send).toHaveBeenLastCalledWith(ASSESSOR, 'DamageRequest', claim, { session: 'session-2' });
      expect(orchestrator.registry.get('POL-12345')?.cycles).toBe(2);
    });

    test('a late response for the timed out session is ignored', async () => {
      let now = 0;
      const { orchestrator, logger, ctx, reply } = setup({ responseTimeoutMs: 5000, now: () => now });
      await orchestrator.tick(ctx);
      now = 10_000;
      await orchestrator.tick(ctx);

      await orchestrator.onDamageResponse(reply(ASSESSOR, 'session-1'), damage);

      expect(logger.warn).toHaveBeenCalledWith('Ignoring DamageResponse', {
        policyId: 'POL-12345',
        session: 'session-1',
        reason: 'stale_session',
        state: 'AwaitingDamage',
      });
    });
  });
});
