/**
 * Registry client.
 *
 * Wires the transport, auth negotiator and request pipeline together and
 * exposes the read operations of the registry API.
 *
 * @module client
 */

import { ChainCredentialProvider, StaticCredentialProvider } from './auth/credentials.js';
import type { Credential, CredentialProvider } from './auth/credentials.js';
import { AuthNegotiator } from './auth/negotiator.js';
import { configFromEnv, createConfig } from './config.js';
import type { PartialRegistryConfig, RegistryConfig } from './config.js';
import type { Digest } from './digest/digest.js';
import { ConsoleLogger } from './observability/logging.js';
import type { Logger } from './observability/logging.js';
import { createBlobStreamer } from './operations/blobs.js';
import type { BlobHead, BlobStream, BlobStreamer, GetBlobOptions } from './operations/blobs.js';
import { createCatalogOps } from './operations/catalog.js';
import type { CatalogOps } from './operations/catalog.js';
import type { CallOptions, OperationContext } from './operations/context.js';
import { createManifestResolver } from './operations/manifests.js';
import type { ManifestHead, ManifestResolver } from './operations/manifests.js';
import type { Page, PageCursor, PageOptions } from './operations/pagination.js';
import { createTagOps } from './operations/tags.js';
import type { TagOps } from './operations/tags.js';
import { FetchTransport } from './transport/http.js';
import type { HttpTransport } from './transport/http.js';
import { RequestPipeline } from './transport/pipeline.js';
import type { ManifestDescriptor, Platform } from './types/manifest.js';

/**
 * Header a v2 registry sets on its base endpoint.
 */
const API_VERSION_HEADER = 'docker-distribution-api-version';

/**
 * Registry client interface.
 */
export interface RegistryClient {
  /**
   * Gets the client configuration.
   */
  getConfig(): Readonly<RegistryConfig>;

  /**
   * Installs a credential and verifies it with an authenticated `GET /v2/`.
   *
   * @throws {RegistryError} AuthenticationFailed when the registry refuses it
   */
  login(credential: Credential | CredentialProvider, options?: CallOptions): Promise<void>;

  /**
   * Calls `GET /v2/` with authentication.
   */
  ping(options?: CallOptions): Promise<void>;

  /**
   * Checks whether the endpoint speaks the v2 API, without authenticating.
   */
  isV2Supported(options?: CallOptions): Promise<boolean>;

  /**
   * Lazily yields every tag of a repository, following pagination links.
   */
  listTags(repository: string, options?: PageOptions): AsyncGenerator<string, void, undefined>;

  /**
   * Lazily yields the tag pages of a repository.
   */
  listTagPages(repository: string, options?: PageOptions): AsyncGenerator<Page<string>, void, undefined>;

  /**
   * Fetches one page of tags.
   */
  fetchTagsPage(repository: string, options?: PageOptions, cursor?: PageCursor): Promise<Page<string>>;

  /**
   * Lazily yields every repository in the catalog.
   */
  listCatalog(options?: PageOptions): AsyncGenerator<string, void, undefined>;

  /**
   * Lazily yields the catalog pages.
   */
  listCatalogPages(options?: PageOptions): AsyncGenerator<Page<string>, void, undefined>;

  /**
   * Fetches one page of the catalog.
   */
  fetchCatalogPage(options?: PageOptions, cursor?: PageCursor): Promise<Page<string>>;

  /**
   * Fetches and verifies a manifest by tag or digest.
   */
  getManifest(
    repository: string,
    reference: string | Digest,
    options?: CallOptions
  ): Promise<ManifestDescriptor>;

  /**
   * Fetches a manifest, following a list or index to the entry for
   * `platform`.
   */
  getManifestForPlatform(
    repository: string,
    reference: string | Digest,
    platform: Platform | string,
    options?: CallOptions
  ): Promise<ManifestDescriptor>;

  /**
   * Gets manifest headers; null when it does not exist.
   */
  headManifest(
    repository: string,
    reference: string | Digest,
    options?: CallOptions
  ): Promise<ManifestHead | null>;

  /**
   * Checks if a manifest exists.
   */
  hasManifest(repository: string, reference: string | Digest, options?: CallOptions): Promise<boolean>;

  /**
   * Opens a blob as a stream verified against its digest.
   */
  getBlob(repository: string, digest: string | Digest, options?: GetBlobOptions): Promise<BlobStream>;

  /**
   * Gets blob headers; null when it does not exist.
   */
  headBlob(repository: string, digest: string | Digest, options?: CallOptions): Promise<BlobHead | null>;

  /**
   * Checks if a blob exists.
   */
  hasBlob(repository: string, digest: string | Digest, options?: CallOptions): Promise<boolean>;
}

/**
 * Client construction options.
 */
export interface ClientOptions {
  /** HTTP transport (default: FetchTransport) */
  transport?: HttpTransport;
  /** Credential source (default: anonymous) */
  credentials?: CredentialProvider | Credential;
  /** Logger (default: ConsoleLogger at `config.logLevel`) */
  logger?: Logger;
  /** Clock for token expiry, epoch milliseconds */
  now?: () => number;
}

/**
 * Registry client implementation.
 */
export class RegistryClientImpl implements RegistryClient {
  private readonly config: RegistryConfig;
  private readonly logger: Logger;
  private readonly negotiator: AuthNegotiator;
  private readonly pipeline: RequestPipeline;
  private readonly manifests: ManifestResolver;
  private readonly blobs: BlobStreamer;
  private readonly tags: TagOps;
  private readonly catalog: CatalogOps;

  constructor(config: RegistryConfig, options: ClientOptions = {}) {
    this.config = config;
    this.logger = (options.logger ?? new ConsoleLogger({ level: config.logLevel })).child({
      registry: config.endpoint,
    });

    const transport = options.transport ?? new FetchTransport({ timeout: config.timeout });

    this.negotiator = new AuthNegotiator({
      transport,
      credentials: toProvider(options.credentials),
      tokenTimeout: config.tokenTimeout,
      defaultTokenTtl: config.defaultTokenTtl,
      tokenExpiryMargin: config.tokenExpiryMargin,
      tokenCacheMaxSize: config.tokenCacheMaxSize,
      userAgent: config.userAgent,
      logger: this.logger,
      now: options.now,
    });

    this.pipeline = new RequestPipeline({
      endpoint: config.endpoint,
      transport,
      negotiator: this.negotiator,
      timeout: config.timeout,
      userAgent: config.userAgent,
      logger: this.logger,
    });

    const context: OperationContext = {
      config,
      pipeline: this.pipeline,
      logger: this.logger,
    };
    this.manifests = createManifestResolver(context);
    this.blobs = createBlobStreamer(context);
    this.tags = createTagOps(context);
    this.catalog = createCatalogOps(context);
  }

  getConfig(): Readonly<RegistryConfig> {
    return this.config;
  }

  async login(
    credential: Credential | CredentialProvider,
    options: CallOptions = {}
  ): Promise<void> {
    this.negotiator.setCredentials(credential);
    await this.ping(options);
    this.logger.info('Logged in to registry');
  }

  async ping(options: CallOptions = {}): Promise<void> {
    const response = await this.pipeline.execute({
      operation: { kind: 'ping' },
      method: 'GET',
      path: '/v2/',
      signal: options.signal,
    });
    await response.discard();
  }

  async isV2Supported(options: CallOptions = {}): Promise<boolean> {
    const response = await this.pipeline.send({
      operation: { kind: 'ping' },
      method: 'GET',
      path: '/v2/',
      signal: options.signal,
    });
    await response.discard();

    const version = response.headers.get(API_VERSION_HEADER);
    return (
      (response.status === 200 || response.status === 401) &&
      version !== null &&
      version.trim().toLowerCase() === 'registry/2.0'
    );
  }

  listTags(repository: string, options?: PageOptions): AsyncGenerator<string, void, undefined> {
    return this.tags.list(repository, options);
  }

  listTagPages(
    repository: string,
    options?: PageOptions
  ): AsyncGenerator<Page<string>, void, undefined> {
    return this.tags.pages(repository, options);
  }

  fetchTagsPage(
    repository: string,
    options?: PageOptions,
    cursor?: PageCursor
  ): Promise<Page<string>> {
    return this.tags.page(repository, options, cursor);
  }

  listCatalog(options?: PageOptions): AsyncGenerator<string, void, undefined> {
    return this.catalog.list(options);
  }

  listCatalogPages(options?: PageOptions): AsyncGenerator<Page<string>, void, undefined> {
    return this.catalog.pages(options);
  }

  fetchCatalogPage(options?: PageOptions, cursor?: PageCursor): Promise<Page<string>> {
    return this.catalog.page(options, cursor);
  }

  getManifest(
    repository: string,
    reference: string | Digest,
    options?: CallOptions
  ): Promise<ManifestDescriptor> {
    return this.manifests.resolve(repository, reference, options);
  }

  getManifestForPlatform(
    repository: string,
    reference: string | Digest,
    platform: Platform | string,
    options?: CallOptions
  ): Promise<ManifestDescriptor> {
    return this.manifests.resolveForPlatform(repository, reference, platform, options);
  }

  headManifest(
    repository: string,
    reference: string | Digest,
    options?: CallOptions
  ): Promise<ManifestHead | null> {
    return this.manifests.head(repository, reference, options);
  }

  hasManifest(
    repository: string,
    reference: string | Digest,
    options?: CallOptions
  ): Promise<boolean> {
    return this.manifests.exists(repository, reference, options);
  }

  getBlob(
    repository: string,
    digest: string | Digest,
    options?: GetBlobOptions
  ): Promise<BlobStream> {
    return this.blobs.get(repository, digest, options);
  }

  headBlob(
    repository: string,
    digest: string | Digest,
    options?: CallOptions
  ): Promise<BlobHead | null> {
    return this.blobs.head(repository, digest, options);
  }

  hasBlob(repository: string, digest: string | Digest, options?: CallOptions): Promise<boolean> {
    return this.blobs.exists(repository, digest, options);
  }
}

function toProvider(
  credentials: CredentialProvider | Credential | undefined
): CredentialProvider | undefined {
  if (credentials === undefined) {
    return undefined;
  }
  return 'getCredential' in credentials ? credentials : new StaticCredentialProvider(credentials);
}

/**
 * Creates a registry client.
 *
 * @example
 * ```typescript
 * const client = createClient('registry.example.com', {
 *   credentials: Credential.basic('user', 'secret'),
 * });
 * for await (const tag of client.listTags('team/app')) {
 *   console.log(tag);
 * }
 * ```
 */
export function createClient(
  config: string | RegistryConfig | PartialRegistryConfig,
  options: ClientOptions = {}
): RegistryClient {
  const resolved = typeof config === 'string' ? createConfig({ endpoint: config }) : createConfig(config);
  return new RegistryClientImpl(resolved, options);
}

/**
 * Creates a client from environment variables. Credentials come from
 * `REGISTRY_USERNAME` / `REGISTRY_PASSWORD`, then the docker config.
 */
export function createClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: Omit<ClientOptions, 'credentials'> = {}
): RegistryClient {
  const config = configFromEnv(env);
  return new RegistryClientImpl(config, {
    ...options,
    credentials: ChainCredentialProvider.defaultChain(config.endpoint, env),
  });
}

/**
 * Creates a client for `endpoint` and logs in with `credential`.
 */
export async function login(
  endpoint: string | PartialRegistryConfig,
  credential: Credential | CredentialProvider,
  options: Omit<ClientOptions, 'credentials'> = {}
): Promise<RegistryClient> {
  const client = createClient(endpoint, options);
  await client.login(credential);
  return client;
}
