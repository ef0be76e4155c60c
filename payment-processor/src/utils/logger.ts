import { Logger as AgentLogger } from '@deposit-refund/messaging';

export const Logger = new AgentLogger('payment-processor');
