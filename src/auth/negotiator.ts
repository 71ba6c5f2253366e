/**
 * Authentication negotiation against registry challenges.
 *
 * Each resource scope starts unauthenticated. When the registry answers
 * with a 401 and a challenge, the negotiator produces a credential for that
 * challenge (the static Basic credential, or a bearer token fetched from the
 * challenge's realm) and remembers the challenge so later requests for the
 * same scope are authorized up front. Bearer tokens are cached per
 * `(realm, service, scope)` key and fetched at most once at a time per key.
 *
 * @module auth/negotiator
 */

import { z } from 'zod';
import { RegistryError, RegistryErrorKind, isRegistryError } from '../errors.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { readBody, readText, redactUrl } from '../transport/http.js';
import type { HttpTransport } from '../transport/http.js';
import { challengeKey } from './challenge.js';
import type { AuthChallenge } from './challenge.js';
import { Credential, StaticCredentialProvider } from './credentials.js';
import type { CredentialProvider } from './credentials.js';
import { SecretString } from './secret.js';
import { TokenCache } from './token-cache.js';
import type { BearerToken } from './token-cache.js';

/**
 * Smallest token lifetime honoured, in seconds.
 */
const MIN_TOKEN_TTL = 60;

/**
 * Largest token response read, in bytes.
 */
const MAX_TOKEN_RESPONSE_BYTES = 1024 * 1024;

type BearerChallenge = Extract<AuthChallenge, { scheme: 'bearer' }>;

/**
 * Credential attached to one request.
 */
export interface Authorization {
  readonly scheme: 'none' | 'basic' | 'bearer';
  /** Value of the Authorization header */
  readonly header?: string;
  /** Token cache key, for negotiated bearer tokens */
  readonly key?: string;
  /** Token sent, for negotiated bearer tokens */
  readonly token?: SecretString;
}

const ANONYMOUS: Authorization = { scheme: 'none' };

const tokenResponseSchema = z.object({
  token: z.string().min(1).optional(),
  access_token: z.string().min(1).optional(),
  expires_in: z.number().nonnegative().optional(),
  issued_at: z.string().optional(),
});

/**
 * AuthNegotiator configuration options.
 */
export interface AuthNegotiatorOptions {
  /** Transport used for token requests */
  transport: HttpTransport;
  /** Static credential source (default: anonymous) */
  credentials?: CredentialProvider;
  /** Bound on one token acquisition in milliseconds (default: 10000) */
  tokenTimeout?: number;
  /** Token lifetime in seconds when the server gives none (default: 60) */
  defaultTokenTtl?: number;
  /** Tokens count as expired this many milliseconds early (default: 30000) */
  tokenExpiryMargin?: number;
  /** Maximum cached tokens (default: 100) */
  tokenCacheMaxSize?: number;
  /** User-Agent sent to the auth server */
  userAgent?: string;
  logger?: Logger;
  /** Clock, epoch milliseconds */
  now?: () => number;
}

/**
 * Per-client authentication state machine.
 */
export class AuthNegotiator {
  private readonly transport: HttpTransport;
  private readonly cache: TokenCache;
  private readonly inflight = new Map<string, Promise<BearerToken>>();
  private readonly hints = new Map<string, AuthChallenge>();
  private readonly maxHints: number;
  private readonly tokenTimeout: number;
  private readonly defaultTokenTtl: number;
  private readonly userAgent?: string;
  private readonly logger: Logger;
  private readonly now: () => number;
  private credentials: CredentialProvider;
  private bearerRealm?: { realm: string; service?: string };
  private basicChallenge?: AuthChallenge;

  constructor(options: AuthNegotiatorOptions) {
    this.transport = options.transport;
    this.credentials = options.credentials ?? StaticCredentialProvider.anonymous();
    this.tokenTimeout = options.tokenTimeout ?? 10000;
    this.defaultTokenTtl = options.defaultTokenTtl ?? MIN_TOKEN_TTL;
    this.userAgent = options.userAgent;
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? Date.now;
    this.maxHints = options.tokenCacheMaxSize ?? 100;
    this.cache = new TokenCache({
      maxSize: options.tokenCacheMaxSize,
      expiryMargin: options.tokenExpiryMargin,
      now: this.now,
    });
  }

  /**
   * Replaces the static credential source and forgets every negotiated
   * token and challenge.
   */
  setCredentials(credentials: CredentialProvider | Credential): void {
    this.credentials =
      'getCredential' in credentials ? credentials : new StaticCredentialProvider(credentials);
    this.reset();
  }

  /**
   * Forgets negotiated tokens and remembered challenges.
   */
  reset(): void {
    this.cache.clear();
    this.hints.clear();
    this.bearerRealm = undefined;
    this.basicChallenge = undefined;
  }

  /**
   * Number of cached bearer tokens.
   */
  get cachedTokenCount(): number {
    return this.cache.size();
  }

  /**
   * Number of scopes with a remembered challenge.
   */
  get challengeCount(): number {
    return this.hints.size;
  }

  /**
   * Credential to attach to a request for `scope`, based on what earlier
   * challenges taught. Unknown scopes on a registry that has not challenged
   * yet go out unauthenticated.
   */
  async authorize(scope: string, signal?: AbortSignal): Promise<Authorization> {
    const credential = await this.credentials.getCredential();
    if (credential.type === 'bearer') {
      if (credential.expiresAt !== undefined && credential.expiresAt <= this.now()) {
        throw RegistryError.authenticationFailed('Configured bearer token has expired', {
          context: { scope, expiresAt: new Date(credential.expiresAt).toISOString() },
        });
      }
      return { scheme: 'bearer', header: `Bearer ${credential.token.expose()}` };
    }

    const hint = this.hints.get(scope) ?? this.derivedChallenge(scope);
    if (!hint) {
      return ANONYMOUS;
    }

    if (hint.scheme === 'basic') {
      return credential.type === 'basic' ? basicAuthorization(credential) : ANONYMOUS;
    }

    return this.bearerAuthorization(hint, credential, signal);
  }

  /**
   * Answers a challenge received for `scope`.
   *
   * `previous` is the authorization the rejected request carried; what it
   * used is invalidated first.
   *
   * @throws {RegistryError} AuthenticationFailed when the challenge cannot be
   * met with the configured credential; AuthServerError when the token
   * endpoint fails
   */
  async negotiate(
    scope: string,
    challenge: AuthChallenge,
    previous: Authorization = ANONYMOUS,
    signal?: AbortSignal
  ): Promise<Authorization> {
    this.remember(scope, challenge);
    if (challenge.scheme === 'bearer') {
      this.bearerRealm = { realm: challenge.realm, service: challenge.service };
    } else {
      this.basicChallenge = challenge;
    }
    this.invalidate(previous);

    this.logger.debug('Authentication challenge received', {
      scope,
      scheme: challenge.scheme,
      ...(challenge.scheme === 'bearer' && {
        realm: redactUrl(challenge.realm),
        challengeScope: challenge.scope,
      }),
    });

    const credential = await this.credentials.getCredential();

    if (credential.type === 'bearer') {
      throw RegistryError.authenticationFailed('Registry rejected the configured bearer token', {
        statusCode: 401,
        context: { scope },
      });
    }

    if (challenge.scheme === 'basic') {
      if (credential.type !== 'basic') {
        throw RegistryError.authenticationFailed(
          'Registry requires Basic authentication and no credentials are configured',
          { statusCode: 401, context: { scope } }
        );
      }
      const authorization = basicAuthorization(credential);
      if (previous.header === authorization.header) {
        throw RegistryError.authenticationFailed('Registry rejected the configured credentials', {
          statusCode: 401,
          context: { scope },
        });
      }
      return authorization;
    }

    return this.bearerAuthorization(challenge, credential, signal);
  }

  /**
   * Drops what a rejected authorization carried: the bearer token, unless
   * another caller has already replaced it, or the cached Basic credential
   * so the provider reads it again.
   */
  invalidate(authorization: Authorization): void {
    if (authorization.scheme === 'basic') {
      this.credentials.invalidate();
      return;
    }
    if (authorization.key && authorization.token) {
      if (this.cache.delete(authorization.key, authorization.token)) {
        this.logger.debug('Bearer token invalidated', { key: authorization.key });
      }
    }
  }

  /**
   * Keeps the challenge for `scope`, dropping the oldest scope past the
   * token cache size.
   */
  private remember(scope: string, challenge: AuthChallenge): void {
    this.hints.delete(scope);
    this.hints.set(scope, challenge);
    if (this.hints.size > this.maxHints) {
      const oldest = this.hints.keys().next();
      if (!oldest.done) {
        this.hints.delete(oldest.value);
      }
    }
  }

  /**
   * Challenge expected for a scope not seen yet: a bearer challenge on the
   * known realm, or the registry-wide Basic challenge.
   */
  private derivedChallenge(scope: string): AuthChallenge | undefined {
    if (this.bearerRealm) {
      return { scheme: 'bearer', ...this.bearerRealm, scope };
    }
    return this.basicChallenge;
  }

  private async bearerAuthorization(
    challenge: BearerChallenge,
    credential: Credential,
    signal?: AbortSignal
  ): Promise<Authorization> {
    const key = challengeKey(challenge);
    const token = await this.acquire(key, challenge, credential, signal);
    return {
      scheme: 'bearer',
      header: `Bearer ${token.token.expose()}`,
      key,
      token: token.token,
    };
  }

  /**
   * Returns the cached token for `key`, joining or starting the single
   * in-flight acquisition when there is none.
   */
  private acquire(
    key: string,
    challenge: BearerChallenge,
    credential: Credential,
    signal?: AbortSignal
  ): Promise<BearerToken> {
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug('Bearer token cache hit', { key });
      return Promise.resolve(cached);
    }

    const existing = this.inflight.get(key);
    if (existing) {
      this.logger.debug('Joining in-flight token request', { key });
      return withSignal(existing, signal);
    }

    const acquisition = (async (): Promise<BearerToken> => {
      try {
        const token = await this.requestToken(challenge, credential);
        this.cache.set(key, token);
        return token;
      } finally {
        this.inflight.delete(key);
      }
    })();
    this.inflight.set(key, acquisition);

    // Observed here so a failure is never unhandled when every waiter aborted
    acquisition.catch((error: unknown) => {
      this.logger.debug('Token request failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    });

    return withSignal(acquisition, signal);
  }

  private async requestToken(
    challenge: BearerChallenge,
    credential: Credential
  ): Promise<BearerToken> {
    const url = new URL(challenge.realm);
    if (challenge.service !== undefined) {
      url.searchParams.set('service', challenge.service);
    }
    if (challenge.scope !== undefined) {
      url.searchParams.set('scope', challenge.scope);
    }

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }
    if (credential.type === 'basic') {
      headers.Authorization = Credential.basicHeader(credential.username, credential.password);
    }

    const realm = redactUrl(challenge.realm);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.tokenTimeout);
    const started = this.now();

    try {
      const response = await this.transport.perform({
        method: 'GET',
        url: url.toString(),
        headers,
        signal: controller.signal,
        timeout: this.tokenTimeout,
      });

      if (response.status === 401 || response.status === 403) {
        const body = await readText(response);
        this.credentials.invalidate();
        throw RegistryError.authenticationFailed(
          `Auth server refused credentials for scope '${challenge.scope ?? ''}'`,
          {
            statusCode: response.status,
            body,
            context: { realm, scope: challenge.scope },
          }
        );
      }

      if (response.status < 200 || response.status >= 300) {
        const body = await readText(response);
        throw RegistryError.authServerError(realm, `HTTP ${response.status}`, {
          statusCode: response.status,
          body,
        });
      }

      const raw = await readBody(response, MAX_TOKEN_RESPONSE_BYTES, (max) =>
        RegistryError.authServerError(realm, `token response exceeds ${max} bytes`)
      );
      const token = this.parseTokenResponse(realm, Buffer.from(raw).toString('utf8'));

      this.logger.debug('Bearer token acquired', {
        realm,
        scope: challenge.scope,
        elapsedMs: this.now() - started,
      });
      return { ...token, scope: challenge.scope };
    } catch (error) {
      if (isRegistryError(error) && error.kind !== RegistryErrorKind.TransportError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw RegistryError.authServerError(realm, `timed out after ${this.tokenTimeout}ms`, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw RegistryError.authServerError(realm, message, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private parseTokenResponse(realm: string, text: string): BearerToken {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw RegistryError.authServerError(realm, 'token response is not JSON', { cause: error });
    }

    const parsed = tokenResponseSchema.safeParse(document);
    if (!parsed.success) {
      throw RegistryError.authServerError(realm, 'token response has an unexpected shape');
    }

    const value = parsed.data.token ?? parsed.data.access_token;
    if (!value) {
      throw RegistryError.authServerError(realm, 'token response carries no token');
    }

    const issuedAt = parseIssuedAt(parsed.data.issued_at) ?? this.now();
    const ttl = Math.max(parsed.data.expires_in ?? this.defaultTokenTtl, MIN_TOKEN_TTL);

    return {
      token: new SecretString(value),
      issuedAt,
      expiresAt: issuedAt + ttl * 1000,
    };
  }
}

function basicAuthorization(
  credential: Extract<Credential, { type: 'basic' }>
): Authorization {
  return {
    scheme: 'basic',
    header: Credential.basicHeader(credential.username, credential.password),
  };
}

function parseIssuedAt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Waits for a shared promise, giving up early when this caller's signal
 * aborts. The shared work itself keeps running for other waiters.
 */
function withSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(RegistryError.transport('Token acquisition aborted', signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(RegistryError.transport('Token acquisition aborted', signal.reason));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
