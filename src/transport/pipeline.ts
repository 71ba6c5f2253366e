/**
 * Request pipeline for registry API calls.
 *
 * Attaches the best known credential for the operation's scope, performs
 * the exchange and maps the outcome:
 *
 * | status            | result                                           |
 * |-------------------|--------------------------------------------------|
 * | 2xx               | response handed back with its body unread         |
 * | 401 + challenge   | one renegotiation and one retry                   |
 * | 401 again         | AuthenticationFailed                              |
 * | 404               | RepositoryNotFound / ManifestNotFound / BlobNotFound |
 * | 429, 5xx          | Transient, with Retry-After when sent             |
 * | other             | RegistryRejected with status and body             |
 *
 * No other retries happen here; backoff for transient failures belongs to
 * the caller.
 *
 * @module transport/pipeline
 */

import { parseChallenge } from '../auth/challenge.js';
import type { Authorization, AuthNegotiator } from '../auth/negotiator.js';
import {
  MAX_ERROR_BODY_LENGTH,
  RegistryError,
  isRegistryError,
  parseRegistryErrors,
  parseRetryAfter,
} from '../errors.js';
import type { NotFoundTarget, RegistryErrorDetail } from '../errors.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { buildUrl, readText, redactUrl } from './http.js';
import type { HttpTransport, TransportResponse } from './http.js';

/**
 * Registry operation a request belongs to. Decides the auth scope and how a
 * 404 is reported.
 */
export type RegistryOperation =
  | { readonly kind: 'ping' }
  | { readonly kind: 'manifest'; readonly repository: string; readonly reference: string }
  | { readonly kind: 'blob'; readonly repository: string; readonly digest: string }
  | { readonly kind: 'tags'; readonly repository: string }
  | { readonly kind: 'catalog' };

/**
 * Scope of the catalog endpoint.
 */
export const CATALOG_SCOPE = 'registry:catalog:*';

/**
 * Pull scope of a repository.
 */
export function repositoryScope(repository: string, actions: readonly string[] = ['pull']): string {
  return `repository:${repository}:${actions.join(',')}`;
}

/**
 * Auth scope an operation needs. Ping is registry-wide and uses the empty
 * scope.
 */
export function scopeFor(operation: RegistryOperation): string {
  switch (operation.kind) {
    case 'ping':
      return '';
    case 'catalog':
      return CATALOG_SCOPE;
    case 'manifest':
    case 'blob':
    case 'tags':
      return repositoryScope(operation.repository);
  }
}

/**
 * A request through the pipeline.
 */
export interface PipelineRequest {
  readonly operation: RegistryOperation;
  readonly method: 'GET' | 'HEAD';
  /** Path below the endpoint, e.g. `/v2/foo/tags/list` */
  readonly path?: string;
  /** Absolute URL, used instead of `path` (pagination cursors) */
  readonly url?: string;
  readonly query?: Record<string, string | number | undefined>;
  readonly headers?: Readonly<Record<string, string>>;
  readonly signal?: AbortSignal;
}

/**
 * RequestPipeline configuration options.
 */
export interface RequestPipelineOptions {
  endpoint: string;
  transport: HttpTransport;
  negotiator: AuthNegotiator;
  /** Header timeout in milliseconds */
  timeout?: number;
  userAgent?: string;
  logger?: Logger;
}

/**
 * Executes registry requests with authentication and outcome mapping.
 */
export class RequestPipeline {
  readonly endpoint: string;
  private readonly transport: HttpTransport;
  private readonly negotiator: AuthNegotiator;
  private readonly timeout?: number;
  private readonly userAgent?: string;
  private readonly logger: Logger;

  constructor(options: RequestPipelineOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.transport = options.transport;
    this.negotiator = options.negotiator;
    this.timeout = options.timeout;
    this.userAgent = options.userAgent;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Executes a request and returns the successful response with its body
   * unread. The caller must drain or discard it.
   *
   * @throws {RegistryError} for every non-2xx outcome
   */
  async execute(request: PipelineRequest): Promise<TransportResponse> {
    const scope = scopeFor(request.operation);

    let authorization = await this.negotiator.authorize(scope, request.signal);
    let response = await this.send(request, authorization);

    if (response.status === 401) {
      const header = response.headers.get('www-authenticate');
      await response.discard();
      if (!header) {
        throw RegistryError.authenticationFailed('Registry returned 401 without a challenge', {
          statusCode: 401,
          context: operationContext(request.operation),
        });
      }

      const challenge = parseChallenge(header);
      authorization = await this.negotiator.negotiate(
        scope,
        challenge,
        authorization,
        request.signal
      );
      response = await this.send(request, authorization);

      if (response.status === 401) {
        const body = await this.readErrorBody(request, response);
        this.negotiator.invalidate(authorization);
        throw RegistryError.authenticationFailed(
          'Registry rejected the credential obtained from its challenge',
          { statusCode: 401, body, context: operationContext(request.operation) }
        );
      }
    }

    if (response.status >= 200 && response.status < 300) {
      return response;
    }

    throw await this.toError(request, response);
  }

  /**
   * Performs one exchange with the given authorization, without any status
   * handling.
   */
  async send(
    request: PipelineRequest,
    authorization: Authorization = { scheme: 'none' }
  ): Promise<TransportResponse> {
    const url = request.url ?? buildUrl(this.endpoint, request.path ?? '/v2/', request.query);
    const headers: Record<string, string> = { ...request.headers };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }
    if (authorization.header) {
      headers.Authorization = authorization.header;
    }

    const started = Date.now();
    const response = await this.transport.perform({
      method: request.method,
      url,
      headers,
      signal: request.signal,
      timeout: this.timeout,
    });

    this.logger.debug('Registry request', {
      method: request.method,
      url: redactUrl(url),
      status: response.status,
      auth: authorization.scheme,
      elapsedMs: Date.now() - started,
    });

    return response;
  }

  private async toError(
    request: PipelineRequest,
    response: TransportResponse
  ): Promise<RegistryError> {
    const status = response.status;
    const context = operationContext(request.operation);
    const body = await this.readErrorBody(request, response);
    const registryErrors = parseRegistryErrors(body);

    if (status === 404) {
      const target = notFoundTarget(request.operation, registryErrors);
      if (target) {
        return RegistryError.notFound(target, context, registryErrors);
      }
    }

    if (status === 429 || status >= 500) {
      return RegistryError.transient(
        status,
        parseRetryAfter(response.headers.get('retry-after')),
        context
      );
    }

    return RegistryError.rejected(status, body, registryErrors, context);
  }

  private async readErrorBody(
    request: PipelineRequest,
    response: TransportResponse
  ): Promise<string> {
    if (request.method === 'HEAD') {
      await response.discard();
      return '';
    }
    try {
      return await readText(response, MAX_ERROR_BODY_LENGTH);
    } catch (error) {
      // The status alone still classifies the failure
      if (isRegistryError(error)) {
        this.logger.debug('Error body unreadable', { error: error.message });
        return '';
      }
      throw error;
    }
  }
}

/**
 * Registry error codes that name the missing resource.
 */
const NOT_FOUND_CODES: Record<string, NotFoundTarget> = {
  NAME_UNKNOWN: 'repository',
  MANIFEST_UNKNOWN: 'manifest',
  BLOB_UNKNOWN: 'blob',
};

/**
 * Picks the missing resource from the registry's error code, falling back
 * to the operation. Ping and catalog have no resource to report.
 */
export function notFoundTarget(
  operation: RegistryOperation,
  registryErrors: readonly RegistryErrorDetail[] = []
): NotFoundTarget | undefined {
  if (operation.kind === 'ping' || operation.kind === 'catalog') {
    return undefined;
  }
  for (const entry of registryErrors) {
    if (Object.prototype.hasOwnProperty.call(NOT_FOUND_CODES, entry.code)) {
      return NOT_FOUND_CODES[entry.code];
    }
  }
  switch (operation.kind) {
    case 'manifest':
      return 'manifest';
    case 'blob':
      return 'blob';
    case 'tags':
      return 'repository';
  }
}

/**
 * Error context describing an operation.
 */
export function operationContext(operation: RegistryOperation): Record<string, unknown> {
  switch (operation.kind) {
    case 'ping':
    case 'catalog':
      return { operation: operation.kind };
    case 'manifest':
      return {
        operation: operation.kind,
        repository: operation.repository,
        reference: operation.reference,
      };
    case 'blob':
      return { operation: operation.kind, repository: operation.repository, digest: operation.digest };
    case 'tags':
      return { operation: operation.kind, repository: operation.repository };
  }
}
