import crypto from 'crypto';
import { NextFunction, Request, Response } from 'express';
import {
  AuthenticatedRequest,
  buildEnvelopeCanonicalString,
  createEnvelopeAuthHeaders,
  createEnvelopeAuthMiddleware,
  signEnvelopeCanonicalString,
} from '../src/auth/envelopeAuth';

interface MockResponse extends Response {
  status: jest.Mock;
  json: jest.Mock;
}

function createMockResponse(): MockResponse {
  const response = {} as MockResponse;
  response.status = jest.fn().mockReturnValue(response);
  response.json = jest.fn().mockReturnValue(response);
  return response;
}

const SENDER = { address: 'agent1qsender', signingSecret: 'test-secret' };

function createSignedRequest(options?: {
  body?: Buffer;
  agentAddress?: string;
  timestamp?: string;
  nonce?: string;
  secret?: string;
  signatureOverride?: string;
}) {
  const path = '/submit';
  const body = options?.body || Buffer.from('{"version":1}');
  const timestamp = options?.timestamp || '1700000000';
  const nonce = options?.nonce || 'nonce-1';
  const agentAddress = options?.agentAddress || SENDER.address;
  const secret = options?.secret || SENDER.signingSecret;

  const canonical = buildEnvelopeCanonicalString({
    method: 'POST',
    path,
    query: '',
    bodySha256: crypto.createHash('sha256').update(body).digest('hex'),
    timestamp,
    nonce,
  });

  const headers = new Map<string, string>([
    ['x-agent-address', agentAddress],
    ['x-timestamp', timestamp],
    ['x-nonce', nonce],
    ['x-signature', options?.signatureOverride || signEnvelopeCanonicalString(secret, canonical)],
  ]);

  const request = {
    method: 'POST',
    originalUrl: path,
    rawBody: body,
    header(name: string) {
      return headers.get(name.toLowerCase());
    },
  } as unknown as Request;

  return { request, headers };
}

describe('envelope auth middleware', () => {
  const lookupSigner = (address: string) => (address === SENDER.address ? SENDER : undefined);
  const nowSeconds = () => 1700000000;

  function buildMiddleware(consumeNonce: jest.Mock = jest.fn().mockResolvedValue(true)) {
    return createEnvelopeAuthMiddleware({
      enabled: true,
      maxSkewSeconds: 300,
      nonceTtlSeconds: 600,
      lookupSigner,
      consumeNonce,
      nowSeconds,
    });
  }

  async function expectRejected(request: Request, status: number, code: string, error: string, consumeNonce?: jest.Mock) {
    const response = createMockResponse();
    const next = jest.fn() as NextFunction;

    await buildMiddleware(consumeNonce)(request, response, next);

    expect(next).not.toHaveBeenCalled();
    expect(response.status).toHaveBeenCalledWith(status);
    expect(response.json).toHaveBeenCalledWith({ success: false, code, error });
  }

  test('valid signature passes and records the sender', async () => {
    const consumeNonce = jest.fn().mockResolvedValue(true);
    const { request } = createSignedRequest();
    const response = createMockResponse();
    const next = jest.fn() as NextFunction;

    await buildMiddleware(consumeNonce)(request, response, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(response.status).not.toHaveBeenCalled();
    expect(consumeNonce).toHaveBeenCalledWith('agent1qsender', 'nonce-1', 600);
    expect((request as AuthenticatedRequest).envelopeAuth).toEqual({ agentAddress: 'agent1qsender' });
  });

  test('disabled auth lets everything through', async () => {
    const middleware = createEnvelopeAuthMiddleware({
      enabled: false,
      maxSkewSeconds: 300,
      nonceTtlSeconds: 600,
      lookupSigner,
      consumeNonce: jest.fn(),
    });
    const { request, headers } = createSignedRequest();
    headers.clear();
    const next = jest.fn() as NextFunction;

    await middleware(request, createMockResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  test('missing signature header fails', async () => {
    const { request, headers } = createSignedRequest();
    headers.delete('x-signature');

    await expectRejected(request, 401, 'AUTH_MISSING_HEADERS', 'Missing authentication headers');
  });

  test('non-numeric timestamp fails', async () => {
    const { request } = createSignedRequest({ timestamp: '17e8' });
    await expectRejected(request, 401, 'AUTH_INVALID_TIMESTAMP', 'Invalid timestamp format');
  });

  test('timestamp outside the skew window fails', async () => {
    const { request } = createSignedRequest({ timestamp: '1699999000' });
    await expectRejected(request, 401, 'AUTH_TIMESTAMP_SKEW', 'Timestamp outside allowed skew window');
  });

  test('unknown agent fails', async () => {
    const { request } = createSignedRequest({ agentAddress: 'agent1qstranger' });
    await expectRejected(request, 401, 'AUTH_UNKNOWN_AGENT', 'Unknown agent address');
  });

  test('blank nonce fails', async () => {
    const { request } = createSignedRequest({ nonce: '   ' });
    await expectRejected(request, 401, 'AUTH_INVALID_NONCE', 'Invalid nonce format');
  });

  test('signature from another secret fails', async () => {
    const { request } = createSignedRequest({ secret: 'other-secret' });
    await expectRejected(request, 401, 'AUTH_INVALID_SIGNATURE', 'Invalid signature');
  });

  test('tampered body fails', async () => {
    const { request } = createSignedRequest();
    (request as AuthenticatedRequest).rawBody = Buffer.from('{"version":2}');
    await expectRejected(request, 401, 'AUTH_INVALID_SIGNATURE', 'Invalid signature');
  });

  test('replayed nonce fails', async () => {
    const { request } = createSignedRequest();
    await expectRejected(
      request,
      401,
      'AUTH_NONCE_REPLAY',
      'Replay detected for nonce',
      jest.fn().mockResolvedValue(false)
    );
  });

  test('nonce store failure answers 503', async () => {
    const { request } = createSignedRequest();
    await expectRejected(
      request,
      503,
      'AUTH_UNAVAILABLE',
      'Authentication nonce store unavailable',
      jest.fn().mockRejectedValue(new Error('store down'))
    );
  });
});

describe('createEnvelopeAuthHeaders', () => {
  test('signs the canonical request string', () => {
    const headers = createEnvelopeAuthHeaders({
      agentAddress: 'agent1qsender',
      signingSecret: 'test-secret',
      method: 'post',
      path: '/submit',
      query: '?a=1',
      body: '{}',
      timestamp: 1700000000,
      nonce: 'nonce-7',
    });

    const expected = signEnvelopeCanonicalString(
      'test-secret',
      [
        'POST',
        '/submit',
        'a=1',
        crypto.createHash('sha256').update('{}').digest('hex'),
        '1700000000',
        'nonce-7',
      ].join('\n')
    );

    expect(headers).toEqual({
      'X-Agent-Address': 'agent1qsender',
      'X-Timestamp': '1700000000',
      'X-Nonce': 'nonce-7',
      'X-Signature': expected,
    });
  });

  test('generates a nonce when none is given', () => {
    const headers = createEnvelopeAuthHeaders({
      agentAddress: 'agent1qsender',
      signingSecret: 'test-secret',
      method: 'POST',
      path: '/submit',
    });

    expect(headers['X-Nonce']).toMatch(/^[0-9a-f]{32}$/);
  });
});
