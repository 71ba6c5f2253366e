/**
 * Tests for challenge negotiation, token caching and singleflight.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthNegotiator } from '../negotiator.js';
import type { AuthNegotiatorOptions } from '../negotiator.js';
import { Credential, StaticCredentialProvider } from '../credentials.js';
import type { CredentialProvider } from '../credentials.js';
import { RegistryError, RegistryErrorKind } from '../../errors.js';
import { MockTransport } from '../../testing/mock-transport.js';
import type { TransportRequest } from '../../transport/http.js';
import { RequestPipeline } from '../../transport/pipeline.js';
import type { PipelineRequest } from '../../transport/pipeline.js';

const ENDPOINT = 'https://registry.example';
const REALM = 'https://auth.example/token';

function bearerChallenge(repository: string): string {
  return `Bearer realm="${REALM}",service="registry",scope="repository:${repository}:pull"`;
}

function manifestRequest(repository: string): PipelineRequest {
  return {
    operation: { kind: 'manifest', repository, reference: 'latest' },
    method: 'GET',
    path: `/v2/${repository}/manifests/latest`,
  };
}

function basicHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

async function failure(promise: Promise<unknown>): Promise<RegistryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RegistryError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the request to fail');
}

/**
 * Registry that accepts `Bearer test-token*` and challenges everything else.
 */
function bearerRegistry(transport: MockTransport, repository: string): void {
  transport.on('GET', `/v2/${repository}/manifests/latest`, (request) =>
    request.headers.Authorization?.startsWith('Bearer test-token')
      ? { status: 200, body: 'manifest' }
      : { status: 401, headers: { 'WWW-Authenticate': bearerChallenge(repository) } }
  );
}

function tokenServer(transport: MockTransport, delayMs?: number): void {
  transport.on('GET', REALM, (_request, call) => ({
    status: 200,
    body: { token: `test-token-${call}`, expires_in: 300 },
    delayMs,
  }));
}

function tokenRequests(transport: MockTransport): TransportRequest[] {
  return transport.requestsTo('GET', REALM);
}

/**
 * Provider that counts how often its cached credential is dropped.
 */
class CountingProvider implements CredentialProvider {
  invalidations = 0;

  constructor(private readonly credential: Credential) {}

  async getCredential(): Promise<Credential> {
    return this.credential;
  }

  invalidate(): void {
    this.invalidations += 1;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

describe('AuthNegotiator', () => {
  let transport: MockTransport;
  let now: number;

  function createPipeline(options: Partial<AuthNegotiatorOptions> = {}): {
    pipeline: RequestPipeline;
    negotiator: AuthNegotiator;
  } {
    const negotiator = new AuthNegotiator({ transport, now: () => now, ...options });
    const pipeline = new RequestPipeline({ endpoint: ENDPOINT, transport, negotiator });
    return { pipeline, negotiator };
  }

  beforeEach(() => {
    transport = new MockTransport();
    now = 1_000_000;
  });

  describe('bearer challenges', () => {
    it('should fetch one token and retry once', async () => {
      bearerRegistry(transport, 'foo');
      tokenServer(transport);
      const { pipeline, negotiator } = createPipeline();

      const response = await pipeline.execute(manifestRequest('foo'));
      await response.discard();

      expect(response.status).toBe(200);
      const tokens = tokenRequests(transport);
      expect(tokens).toHaveLength(1);
      const url = new URL(tokens[0].url);
      expect(`${url.origin}${url.pathname}`).toBe(REALM);
      expect(url.searchParams.get('service')).toBe('registry');
      expect(url.searchParams.get('scope')).toBe('repository:foo:pull');

      const manifests = transport.requestsTo('GET', '/v2/foo/manifests/latest');
      expect(manifests).toHaveLength(2);
      expect(manifests[0].headers.Authorization).toBeUndefined();
      expect(manifests[1].headers.Authorization).toBe('Bearer test-token-1');
      expect(negotiator.cachedTokenCount).toBe(1);
    });

    it('should reuse the cached token for the same scope', async () => {
      bearerRegistry(transport, 'foo');
      tokenServer(transport);
      const { pipeline } = createPipeline();

      await (await pipeline.execute(manifestRequest('foo'))).discard();
      await (await pipeline.execute(manifestRequest('foo'))).discard();

      expect(tokenRequests(transport)).toHaveLength(1);
      const manifests = transport.requestsTo('GET', '/v2/foo/manifests/latest');
      expect(manifests).toHaveLength(3);
      expect(manifests[2].headers.Authorization).toBe('Bearer test-token-1');
    });

    it('should share one token request between concurrent callers', async () => {
      bearerRegistry(transport, 'foo');
      tokenServer(transport, 20);
      const { pipeline } = createPipeline();

      const responses = await Promise.all(
        Array.from({ length: 5 }, () => pipeline.execute(manifestRequest('foo')))
      );

      expect(responses.map((r) => r.status)).toEqual([200, 200, 200, 200, 200]);
      expect(tokenRequests(transport)).toHaveLength(1);
      const authorized = transport
        .requestsTo('GET', '/v2/foo/manifests/latest')
        .filter((request) => request.headers.Authorization === 'Bearer test-token-1');
      expect(authorized).toHaveLength(5);
    });

    it('should fail after a second 401 without another token request', async () => {
      transport.on('GET', '/v2/foo/manifests/latest', {
        status: 401,
        headers: { 'WWW-Authenticate': bearerChallenge('foo') },
      });
      tokenServer(transport);
      const { pipeline, negotiator } = createPipeline();

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.kind).toBe(RegistryErrorKind.AuthenticationFailed);
      expect(error.statusCode).toBe(401);
      expect(tokenRequests(transport)).toHaveLength(1);
      expect(transport.requestsTo('GET', '/v2/foo/manifests/latest')).toHaveLength(2);
      expect(negotiator.cachedTokenCount).toBe(0);
    });

    it('should request a new token once the cached one expires', async () => {
      bearerRegistry(transport, 'foo');
      tokenServer(transport);
      const { pipeline } = createPipeline({ tokenExpiryMargin: 30_000 });

      await (await pipeline.execute(manifestRequest('foo'))).discard();
      // 300 s lifetime minus the 30 s margin
      now += 270_000;
      await (await pipeline.execute(manifestRequest('foo'))).discard();

      expect(tokenRequests(transport)).toHaveLength(2);
      const manifests = transport.requestsTo('GET', '/v2/foo/manifests/latest');
      expect(manifests[manifests.length - 1].headers.Authorization).toBe('Bearer test-token-2');
    });

    it('should authorize new scopes on a known realm up front', async () => {
      bearerRegistry(transport, 'foo');
      bearerRegistry(transport, 'bar');
      tokenServer(transport);
      const { pipeline } = createPipeline();

      await (await pipeline.execute(manifestRequest('foo'))).discard();
      await (await pipeline.execute(manifestRequest('bar'))).discard();

      const tokens = tokenRequests(transport);
      expect(tokens).toHaveLength(2);
      expect(new URL(tokens[1].url).searchParams.get('scope')).toBe('repository:bar:pull');
      expect(transport.requestsTo('GET', '/v2/bar/manifests/latest')).toHaveLength(1);
    });

    it('should authenticate token requests with basic credentials', async () => {
      bearerRegistry(transport, 'foo');
      tokenServer(transport);
      const { pipeline } = createPipeline({
        credentials: StaticCredentialProvider.basic('user', 'test-secret'),
      });

      await (await pipeline.execute(manifestRequest('foo'))).discard();

      expect(tokenRequests(transport)[0].headers.Authorization).toBe(basicHeader('user', 'test-secret'));
    });

    it('should accept access_token and honour the minimum lifetime', async () => {
      bearerRegistry(transport, 'foo');
      transport.on('GET', REALM, { status: 200, body: { access_token: 'test-token-a', expires_in: 5 } });
      const { pipeline } = createPipeline({ tokenExpiryMargin: 0 });

      await (await pipeline.execute(manifestRequest('foo'))).discard();
      now += 59_000;
      await (await pipeline.execute(manifestRequest('foo'))).discard();

      expect(tokenRequests(transport)).toHaveLength(1);
    });
  });

  describe('token endpoint failures', () => {
    it('should report a 5xx as AuthServerError', async () => {
      bearerRegistry(transport, 'foo');
      transport.on('GET', REALM, { status: 502, body: 'bad gateway' });
      const { pipeline } = createPipeline();

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.kind).toBe(RegistryErrorKind.AuthServerError);
      expect(error.message).toBe(`Token request to ${REALM} failed: HTTP 502`);
      expect(error.isTransient()).toBe(true);
    });

    it('should report refused credentials as AuthenticationFailed', async () => {
      bearerRegistry(transport, 'foo');
      transport.on('GET', REALM, { status: 401, body: 'unauthorized' });
      const { pipeline } = createPipeline({
        credentials: StaticCredentialProvider.basic('user', 'wrong-secret'),
      });

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.kind).toBe(RegistryErrorKind.AuthenticationFailed);
      expect(error.statusCode).toBe(401);
    });

    it('should drop the cached credential when the auth server refuses it', async () => {
      bearerRegistry(transport, 'foo');
      transport.on('GET', REALM, { status: 403, body: 'denied' });
      const provider = new CountingProvider(Credential.basic('user', 'wrong-secret'));
      const { pipeline } = createPipeline({ credentials: provider });

      await failure(pipeline.execute(manifestRequest('foo')));

      expect(provider.invalidations).toBe(1);
    });

    it('should reject a response without token', async () => {
      bearerRegistry(transport, 'foo');
      transport.on('GET', REALM, { status: 200, body: { expires_in: 300 } });
      const { pipeline } = createPipeline();

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.message).toBe(`Token request to ${REALM} failed: token response carries no token`);
    });

    it('should bound the acquisition by the token timeout', async () => {
      bearerRegistry(transport, 'foo');
      tokenServer(transport, 1_000);
      const { pipeline } = createPipeline({ tokenTimeout: 20 });

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.kind).toBe(RegistryErrorKind.AuthServerError);
      expect(error.message).toBe(`Token request to ${REALM} failed: timed out after 20ms`);
    });

    it('should let the next caller retry after a failed acquisition', async () => {
      bearerRegistry(transport, 'foo');
      transport.once('GET', REALM, { status: 503 });
      tokenServer(transport);
      const { pipeline } = createPipeline();

      await failure(pipeline.execute(manifestRequest('foo')));
      const response = await pipeline.execute(manifestRequest('foo'));

      expect(response.status).toBe(200);
      expect(tokenRequests(transport)).toHaveLength(2);
    });
  });

  describe('basic challenges', () => {
    function basicRegistry(): void {
      transport.on('GET', '/v2/foo/manifests/latest', (request) =>
        request.headers.Authorization === basicHeader('user', 'test-secret')
          ? { status: 200 }
          : { status: 401, headers: { 'WWW-Authenticate': 'Basic realm="Registry"' } }
      );
    }

    it('should answer with the configured credentials and send them up front afterwards', async () => {
      basicRegistry();
      const { pipeline } = createPipeline({
        credentials: StaticCredentialProvider.basic('user', 'test-secret'),
      });

      await (await pipeline.execute(manifestRequest('foo'))).discard();
      await (await pipeline.execute(manifestRequest('foo'))).discard();

      const requests = transport.requestsTo('GET', '/v2/foo/manifests/latest');
      expect(requests.map((r) => r.headers.Authorization)).toEqual([
        undefined,
        basicHeader('user', 'test-secret'),
        basicHeader('user', 'test-secret'),
      ]);
    });

    it('should fail without credentials', async () => {
      basicRegistry();
      const { pipeline } = createPipeline();

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.kind).toBe(RegistryErrorKind.AuthenticationFailed);
      expect(error.message).toBe(
        'Registry requires Basic authentication and no credentials are configured'
      );
    });

    it('should fail when the credentials are refused', async () => {
      basicRegistry();
      const { pipeline } = createPipeline({
        credentials: StaticCredentialProvider.basic('user', 'wrong-secret'),
      });

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.kind).toBe(RegistryErrorKind.AuthenticationFailed);
      expect(transport.requestsTo('GET', '/v2/foo/manifests/latest')).toHaveLength(2);
    });

    it('should drop the cached credential when the registry refuses it', async () => {
      basicRegistry();
      const provider = new CountingProvider(Credential.basic('user', 'wrong-secret'));
      const { pipeline } = createPipeline({ credentials: provider });

      await failure(pipeline.execute(manifestRequest('foo')));

      expect(provider.invalidations).toBe(1);
    });

    it('should send the credentials up front for other repositories', async () => {
      basicRegistry();
      transport.on('GET', '/v2/bar/manifests/latest', { status: 200 });
      const { pipeline } = createPipeline({
        credentials: StaticCredentialProvider.basic('user', 'test-secret'),
      });

      await (await pipeline.execute(manifestRequest('foo'))).discard();
      await (await pipeline.execute(manifestRequest('bar'))).discard();

      const requests = transport.requestsTo('GET', '/v2/bar/manifests/latest');
      expect(requests.map((r) => r.headers.Authorization)).toEqual([
        basicHeader('user', 'test-secret'),
      ]);
    });

    it('should remember at most as many scopes as tokens', async () => {
      const { negotiator } = createPipeline({
        credentials: StaticCredentialProvider.basic('user', 'test-secret'),
        tokenCacheMaxSize: 2,
      });

      for (const repository of ['a', 'b', 'c']) {
        await negotiator.negotiate(`repository:${repository}:pull`, { scheme: 'basic' });
      }

      expect(negotiator.challengeCount).toBe(2);
    });
  });

  describe('static bearer credentials', () => {
    it('should send the token on every request', async () => {
      transport.on('GET', '/v2/foo/manifests/latest', { status: 200 });
      const { pipeline } = createPipeline({
        credentials: new StaticCredentialProvider(Credential.bearer('test-token')),
      });

      await (await pipeline.execute(manifestRequest('foo'))).discard();

      expect(transport.requests[0].headers.Authorization).toBe('Bearer test-token');
    });

    it('should refuse an expired token before sending it', async () => {
      const { pipeline } = createPipeline({
        credentials: new StaticCredentialProvider(Credential.bearer('test-token', now - 1)),
      });

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.kind).toBe(RegistryErrorKind.AuthenticationFailed);
      expect(error.message).toBe('Configured bearer token has expired');
      expect(transport.requests).toHaveLength(0);
    });

    it('should send a token that has not expired yet', async () => {
      transport.on('GET', '/v2/foo/manifests/latest', { status: 200 });
      const { pipeline } = createPipeline({
        credentials: new StaticCredentialProvider(Credential.bearer('test-token', now + 60_000)),
      });

      await (await pipeline.execute(manifestRequest('foo'))).discard();

      expect(transport.requests[0].headers.Authorization).toBe('Bearer test-token');
    });

    it('should not renegotiate a rejected token', async () => {
      bearerRegistry(transport, 'foo');
      tokenServer(transport);
      const { pipeline } = createPipeline({
        credentials: new StaticCredentialProvider(Credential.bearer('expired')),
      });

      const error = await failure(pipeline.execute(manifestRequest('foo')));

      expect(error.message).toBe('Registry rejected the configured bearer token');
      expect(tokenRequests(transport)).toHaveLength(0);
    });
  });

  it('should forget tokens when credentials change', async () => {
    bearerRegistry(transport, 'foo');
    tokenServer(transport);
    const { pipeline, negotiator } = createPipeline();

    await (await pipeline.execute(manifestRequest('foo'))).discard();
    negotiator.setCredentials(Credential.basic('user', 'test-secret'));

    expect(negotiator.cachedTokenCount).toBe(0);
  });
});
