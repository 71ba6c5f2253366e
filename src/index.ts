/**
 * Docker / OCI Registry HTTP API v2 client.
 *
 * A read-only client for container registries providing:
 * - Challenge-driven authentication (anonymous, Basic, bearer tokens)
 * - Manifest resolution with digest verification (schema 1, schema 2, OCI)
 * - Streaming blob downloads verified against their digest
 * - Link-header pagination for tags and the repository catalog
 *
 * @module registry-v2-client
 */

// Client
export {
  RegistryClientImpl,
  createClient,
  createClientFromEnv,
  login,
  type RegistryClient,
  type ClientOptions,
} from './client.js';

// Config
export {
  VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_TOKEN_TIMEOUT,
  DEFAULT_USER_AGENT,
  DEFAULT_MAX_MANIFEST_BYTES,
  DEFAULT_TOKEN_EXPIRY_MARGIN,
  DEFAULT_TOKEN_TTL,
  DEFAULT_TOKEN_CACHE_MAX_SIZE,
  DOCKER_HUB_REGISTRY,
  RegistryConfigBuilder,
  configFromEnv,
  createConfig,
  createDefaultConfig,
  normalizeEndpoint,
  validateConfig,
  type RegistryConfig,
  type PartialRegistryConfig,
} from './config.js';

// Errors
export {
  RegistryError,
  RegistryErrorKind,
  isIntegrityError,
  isNotFound,
  isRegistryError,
  isTransient,
  type NotFoundTarget,
  type RegistryErrorDetail,
  type RegistryErrorOptions,
} from './errors.js';

// Digests
export { Digest, DigestAccumulator, type DigestAlgorithm } from './digest/digest.js';

// Auth
export { SecretString } from './auth/secret.js';
export { parseChallenge, parseChallenges, type AuthChallenge } from './auth/challenge.js';
export {
  Credential,
  StaticCredentialProvider,
  EnvCredentialProvider,
  DockerConfigCredentialProvider,
  ChainCredentialProvider,
  type CredentialProvider,
  type DockerConfigOptions,
} from './auth/credentials.js';
export {
  AuthNegotiator,
  type Authorization,
  type AuthNegotiatorOptions,
} from './auth/negotiator.js';

// Types
export {
  MediaType,
  DEFAULT_MANIFEST_MEDIA_TYPES,
  Platform,
  configDigest,
  isIndexMediaType,
  layerDigests,
  manifestKindOf,
  type Descriptor,
  type Manifest,
  type ManifestDescriptor,
  type ManifestKind,
  type ManifestList,
  type ManifestListEntry,
  type SchemaV1Manifest,
  type SchemaV2Manifest,
} from './types/manifest.js';
export { Reference, validateRepository, validateTag } from './types/reference.js';

// Operations
export { BlobStream, type BlobHead, type GetBlobOptions, type VerificationState } from './operations/blobs.js';
export type { ManifestHead } from './operations/manifests.js';
export { PageCursor, type Page, type PageOptions } from './operations/pagination.js';
export type { CallOptions } from './operations/context.js';

// Transport
export {
  FetchTransport,
  type FetchTransportOptions,
  type HttpMethod,
  type HttpTransport,
  type TransportRequest,
  type TransportResponse,
} from './transport/http.js';

// Logging
export {
  ConsoleLogger,
  NoopLogger,
  LogLevel,
  createLogger,
  createNoopLogger,
  parseLogLevel,
  type LogConfig,
  type LogEntry,
  type LogSink,
  type Logger,
} from './observability/logging.js';

// Testing
export {
  MockTransport,
  type MockHandler,
  type MockMatcher,
  type MockResponse,
  type MockRouteOptions,
} from './testing/mock-transport.js';
