const BASE_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  AGENT_SEED: 'test-seed',
};

const CONFIG_VARS = [
  'REFUND_INTERVAL_MS',
  'WORKFLOW_RESPONSE_TIMEOUT_MS',
  'DEMO_BEFORE_IMAGE',
  'DEMO_AFTER_IMAGE',
  'DEMO_CLAIM_AMOUNT',
  'DEMO_POLICY_ID',
  'ORCHESTRATOR_PORT',
  'AUTH_ENABLED',
];

function withEnv(overrides: Record<string, string | undefined>, run: () => void): void {
  const original = process.env;
  process.env = { ...original, ...BASE_ENV };

  for (const key of CONFIG_VARS) {
    delete process.env[key];
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  try {
    run();
  } finally {
    process.env = original;
    jest.resetModules();
  }
}

function loadConfigModule() {
  jest.resetModules();
  jest.doMock('dotenv', () => ({ config: jest.fn() }));
  return require('../src/config') as typeof import('../src/config');
}

describe('orchestrator config', () => {
  let exitSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    exitSpy = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
  });

  test('defaults reproduce the demo claim every ten seconds', () => {
    withEnv({}, () => {
      const { config } = loadConfigModule();

      expect(config.port).toBe(8003);
      expect(config.refundIntervalMs).toBe(10000);
      expect(config.responseTimeoutMs).toBe(0);
      expect(config.demoClaim).toEqual({
        before_image: 'https://example.com/before.jpg',
        after_image: 'https://example.com/after.jpg',
        claim_amount: 1000,
        policy_id: 'POL-12345',
      });
    });
  });

  test('demo values can be overridden', () => {
    withEnv(
      {
        DEMO_AFTER_IMAGE: 'https://example.com/before.jpg',
        DEMO_CLAIM_AMOUNT: '250.5',
        DEMO_POLICY_ID: 'POL-1',
        WORKFLOW_RESPONSE_TIMEOUT_MS: '30000',
      },
      () => {
        const { config } = loadConfigModule();

        expect(config.demoClaim.after_image).toBe('https://example.com/before.jpg');
        expect(config.demoClaim.claim_amount).toBe(250.5);
        expect(config.demoClaim.policy_id).toBe('POL-1');
        expect(config.responseTimeoutMs).toBe(30000);
      }
    );
  });

  test('a missing seed stops the process', () => {
    withEnv({ AGENT_SEED: undefined }, () => {
      expect(() => loadConfigModule()).toThrow('process.exit called');
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toEqual(
        expect.objectContaining({ message: 'Orchestrator config validation failed', error: 'AGENT_SEED is missing' })
      );
    });
  });

  test('refund interval must be at least 100ms', () => {
    withEnv({ REFUND_INTERVAL_MS: '10' }, () => {
      expect(() => loadConfigModule()).toThrow('process.exit called');
      expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toEqual(
        expect.objectContaining({ error: 'REFUND_INTERVAL_MS must be >= 100' })
      );
    });
  });
});
