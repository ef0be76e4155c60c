import { DamageRequest, DamageResponse, PaymentResponse } from '@deposit-refund/messaging';

export type WorkflowState = 'Idle' | 'AwaitingDamage' | 'AwaitingPayment' | 'Done' | 'TimedOut';

// TimedOut is only reached when a response timeout is configured.
const ALLOWED_TRANSITIONS: Record<WorkflowState, WorkflowState[]> = {
  Idle: ['AwaitingDamage'],
  AwaitingDamage: ['AwaitingPayment', 'TimedOut'],
  AwaitingPayment: ['Done', 'TimedOut'],
  Done: ['AwaitingDamage'],
  TimedOut: ['AwaitingDamage'],
};

const STARTABLE_STATES: WorkflowState[] = ['Idle', 'Done', 'TimedOut'];
const WAITING_STATES: WorkflowState[] = ['AwaitingDamage', 'AwaitingPayment'];

export function assertValidTransition(current: WorkflowState, next: WorkflowState): void {
  if (!ALLOWED_TRANSITIONS[current].includes(next)) {
    throw new Error(`Invalid refund workflow transition: ${current} -> ${next}`);
  }
}

export interface RefundWorkflow {
  policyId: string;
  state: WorkflowState;
  session?: string;
  /** Epoch ms at which the current state was entered. */
  stateEnteredAt?: number;
  claim?: DamageRequest;
  damage?: DamageResponse;
  payment?: PaymentResponse;
  cycles: number;
}

export type RecordRejection = 'unknown_policy' | 'stale_session' | 'unexpected_state';

export type RecordResult =
  | { accepted: true; workflow: RefundWorkflow }
  | { accepted: false; reason: RecordRejection; workflow?: RefundWorkflow };

/** In-memory workflow state, one entry per policy, kept for the process lifetime. */
export class RefundWorkflowRegistry {
  private readonly workflows = new Map<string, RefundWorkflow>();

  constructor(private readonly nowMs: () => number = () => Date.now()) {}

  get(policyId: string): RefundWorkflow | undefined {
    return this.workflows.get(policyId);
  }

  stateOf(policyId: string): WorkflowState {
    return this.workflows.get(policyId)?.state ?? 'Idle';
  }

  canStart(policyId: string): boolean {
    return STARTABLE_STATES.includes(this.stateOf(policyId));
  }

  begin(claim: DamageRequest, session: string): RefundWorkflow {
    const previous = this.workflows.get(claim.policy_id);
    assertValidTransition(previous?.state ?? 'Idle', 'AwaitingDamage');

    const workflow: RefundWorkflow = {
      policyId: claim.policy_id,
      state: 'AwaitingDamage',
      session,
      stateEnteredAt: this.nowMs(),
      claim,
      cycles: (previous?.cycles ?? 0) + 1,
    };

    this.workflows.set(claim.policy_id, workflow);
    return workflow;
  }

  recordDamage(response: DamageResponse, session: string): RecordResult {
    const check = this.checkResponse(response.policy_id, session, 'AwaitingDamage');
    if (!check.accepted) {
      return check;
    }

    const workflow = this.transition(check.workflow, 'AwaitingPayment');
    workflow.damage = response;
    return { accepted: true, workflow };
  }

  recordPayment(response: PaymentResponse, session: string): RecordResult {
    const check = this.checkResponse(response.policy_id, session, 'AwaitingPayment');
    if (!check.accepted) {
      return check;
    }

    const workflow = this.transition(check.workflow, 'Done');
    workflow.payment = response;
    return { accepted: true, workflow };
  }

  /** Moves every workflow that has waited longer than timeoutMs to TimedOut and returns them. */
  expire(timeoutMs: number): RefundWorkflow[] {
    const now = this.nowMs();
    const expired: RefundWorkflow[] = [];

    for (const workflow of this.workflows.values()) {
      if (!WAITING_STATES.includes(workflow.state)) {
        continue;
      }

      if (now - (workflow.stateEnteredAt ?? now) > timeoutMs) {
        expired.push(this.transition(workflow, 'TimedOut'));
      }
    }

    return expired;
  }

  private checkResponse(policyId: string, session: string, expected: WorkflowState): RecordResult {
    const workflow = this.workflows.get(policyId);
    if (!workflow) {
      return { accepted: false, reason: 'unknown_policy' };
    }

    if (workflow.session !== session) {
      return { accepted: false, reason: 'stale_session', workflow };
    }

    if (workflow.state !== expected) {
      return { accepted: false, reason: 'unexpected_state', workflow };
    }

    return { accepted: true, workflow };
  }

  private transition(workflow: RefundWorkflow, next: WorkflowState): RefundWorkflow {
    assertValidTransition(workflow.state, next);
    workflow.state = next;
    workflow.stateEnteredAt = this.nowMs();
    return workflow;
  }
}
