import crypto from 'crypto';
import { AgentDirectory } from '../src/directory';
import { AGENT_ADDRESS_PREFIX, createAgentIdentity, deriveAgentAddress } from '../src/identity';
import { ConfigurationError, UnknownAgentError } from '../src/utils/errors';

describe('agent identity', () => {
  test('address is the prefix plus 56 hex characters of the seeded digest', () => {
    const digest = crypto.createHmac('sha256', 'test-seed').update('address:damage-assessor').digest('hex');

    expect(deriveAgentAddress('test-seed', 'damage-assessor')).toBe(`${AGENT_ADDRESS_PREFIX}${digest.slice(0, 56)}`);
    expect(deriveAgentAddress('test-seed', 'damage-assessor')).toHaveLength(63);
  });

  test('same seed and name give the same identity', () => {
    expect(createAgentIdentity('test-seed', 'orchestrator')).toEqual(createAgentIdentity('test-seed', 'orchestrator'));
  });

  test('different names give different addresses and secrets', () => {
    const a = createAgentIdentity('test-seed', 'damage-assessor');
    const b = createAgentIdentity('test-seed', 'payment-processor');

    expect(a.address).not.toBe(b.address);
    expect(a.signingSecret).not.toBe(b.signingSecret);
  });

  test('signing secret differs from the address digest', () => {
    const identity = createAgentIdentity('test-seed', 'orchestrator');
    expect(identity.address.slice(AGENT_ADDRESS_PREFIX.length)).not.toBe(identity.signingSecret.slice(0, 56));
  });

  test('empty seed is a configuration error', () => {
    expect(() => createAgentIdentity('  ', 'orchestrator')).toThrow(ConfigurationError);
    expect(() => createAgentIdentity('test-seed', '')).toThrow('Agent name must not be empty');
  });
});

describe('agent directory', () => {
  const directory = AgentDirectory.fromSeed('test-seed', {
    'damage-assessor': 'http://localhost:8000/submit',
    'payment-processor': 'http://localhost:8001/submit',
  });

  test('resolves entries by address and name', () => {
    const address = deriveAgentAddress('test-seed', 'payment-processor');

    expect(directory.addressOf('payment-processor')).toBe(address);
    expect(directory.require(address)).toEqual(
      expect.objectContaining({
        name: 'payment-processor',
        endpoint: 'http://localhost:8001/submit',
      })
    );
    expect(directory.entries()).toHaveLength(2);
  });

  test('unknown addresses and names raise UnknownAgentError', () => {
    expect(directory.resolve('agent1qnobody')).toBeUndefined();
    expect(() => directory.require('agent1qnobody')).toThrow(UnknownAgentError);
    expect(() => directory.addressOf('orchestrator')).toThrow('Unknown agent name: orchestrator');
  });

  test('duplicate entries are refused', () => {
    const entry = { ...createAgentIdentity('test-seed', 'orchestrator'), endpoint: 'http://localhost:8003/submit' };
    expect(() => new AgentDirectory([entry, entry])).toThrow('Duplicate agent directory entry: orchestrator');
  });
});
