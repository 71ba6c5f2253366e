/**
 * Configuration types for the registry client.
 * @module config
 */

import { z } from 'zod';
import { RegistryError } from './errors.js';
import { LogLevel, parseLogLevel } from './observability/logging.js';
import { DEFAULT_MANIFEST_MEDIA_TYPES } from './types/manifest.js';

/**
 * Package version reported in the default User-Agent.
 */
export const VERSION = '0.1.0';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Default bound on a token acquisition in milliseconds.
 */
export const DEFAULT_TOKEN_TIMEOUT = 10000;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = `registry-v2-client/${VERSION}`;

/**
 * Default cap on manifest bodies (4 MiB).
 */
export const DEFAULT_MAX_MANIFEST_BYTES = 4 * 1024 * 1024;

/**
 * A cached bearer token counts as expired this long before its expiry.
 */
export const DEFAULT_TOKEN_EXPIRY_MARGIN = 30000;

/**
 * Token lifetime in seconds assumed when the auth server omits `expires_in`.
 */
export const DEFAULT_TOKEN_TTL = 60;

/**
 * Default maximum number of cached bearer tokens.
 */
export const DEFAULT_TOKEN_CACHE_MAX_SIZE = 100;

/**
 * Docker Hub's registry host, used when `docker.io` is given.
 */
export const DOCKER_HUB_REGISTRY = 'https://registry-1.docker.io';

const DOCKER_HUB_ALIASES = new Set(['docker.io', 'index.docker.io', 'registry-1.docker.io']);

/**
 * Registry client configuration.
 */
export interface RegistryConfig {
  /** Registry base URL, without the `/v2/` suffix */
  readonly endpoint: string;
  /** Request timeout in milliseconds, until response headers arrive */
  readonly timeout: number;
  /** Token acquisition timeout in milliseconds */
  readonly tokenTimeout: number;
  /** User-Agent header */
  readonly userAgent: string;
  /** Manifest media types offered in the Accept header, in order */
  readonly manifestMediaTypes: readonly string[];
  /** Largest manifest body accepted, in bytes */
  readonly maxManifestBytes: number;
  /** Default `n` for tag and catalog listings */
  readonly pageSize?: number;
  /** Safety margin subtracted from token expiry, in milliseconds */
  readonly tokenExpiryMargin: number;
  /** Token lifetime in seconds when the server gives none */
  readonly defaultTokenTtl: number;
  /** Maximum cached bearer tokens */
  readonly tokenCacheMaxSize: number;
  /** Level of the default console logger */
  readonly logLevel: LogLevel;
}

const configSchema = z.object({
  endpoint: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), 'endpoint must use http or https'),
  timeout: z.number().int().positive(),
  tokenTimeout: z.number().int().positive(),
  userAgent: z.string().min(1),
  manifestMediaTypes: z.array(z.string().min(1)).min(1),
  maxManifestBytes: z.number().int().positive(),
  pageSize: z.number().int().positive().optional(),
  tokenExpiryMargin: z.number().int().nonnegative(),
  defaultTokenTtl: z.number().int().positive(),
  tokenCacheMaxSize: z.number().int().positive(),
  logLevel: z.nativeEnum(LogLevel),
});

/**
 * Normalizes a registry host or URL to a base URL.
 *
 * Hostnames without a scheme get `https://` (or `http://` when `insecure`),
 * Docker Hub aliases map to its registry host, and trailing slashes and a
 * trailing `/v2` are removed.
 *
 * @example
 * ```typescript
 * normalizeEndpoint('docker.io');           // 'https://registry-1.docker.io'
 * normalizeEndpoint('localhost:5000', true); // 'http://localhost:5000'
 * ```
 */
export function normalizeEndpoint(value: string, insecure = false): string {
  let endpoint = value.trim();
  if (DOCKER_HUB_ALIASES.has(endpoint)) {
    return DOCKER_HUB_REGISTRY;
  }
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(endpoint)) {
    endpoint = `${insecure ? 'http' : 'https'}://${endpoint}`;
  }
  endpoint = endpoint.replace(/\/+$/, '');
  endpoint = endpoint.replace(/\/v2$/, '');
  return endpoint;
}

/**
 * Creates the default configuration for an endpoint.
 */
export function createDefaultConfig(endpoint: string): RegistryConfig {
  return {
    endpoint: normalizeEndpoint(endpoint),
    timeout: DEFAULT_TIMEOUT,
    tokenTimeout: DEFAULT_TOKEN_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
    manifestMediaTypes: [...DEFAULT_MANIFEST_MEDIA_TYPES],
    maxManifestBytes: DEFAULT_MAX_MANIFEST_BYTES,
    tokenExpiryMargin: DEFAULT_TOKEN_EXPIRY_MARGIN,
    defaultTokenTtl: DEFAULT_TOKEN_TTL,
    tokenCacheMaxSize: DEFAULT_TOKEN_CACHE_MAX_SIZE,
    logLevel: LogLevel.Warn,
  };
}

/**
 * Validates a configuration.
 *
 * @throws {RegistryError} InvalidConfig listing every failing field
 */
export function validateConfig(config: RegistryConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw RegistryError.invalidConfig(`Invalid configuration: ${issues.join(', ')}`);
  }
}

/**
 * Partial configuration accepted by `createConfig`.
 */
export type PartialRegistryConfig = Partial<Omit<RegistryConfig, 'endpoint'>> & {
  endpoint: string;
  insecure?: boolean;
};

/**
 * Creates a validated configuration from a partial one.
 */
export function createConfig(partial: PartialRegistryConfig): RegistryConfig {
  const { insecure, endpoint, ...rest } = partial;
  const config: RegistryConfig = {
    ...createDefaultConfig(endpoint),
    ...stripUndefined(rest),
    endpoint: normalizeEndpoint(endpoint, insecure),
  };
  validateConfig(config);
  return config;
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

/**
 * Configuration builder.
 *
 * @example
 * ```typescript
 * const config = new RegistryConfigBuilder('registry.example.com')
 *   .timeout(5000)
 *   .pageSize(100)
 *   .build();
 * ```
 */
export class RegistryConfigBuilder {
  private config: RegistryConfig;
  private insecureEndpoint = false;
  private rawEndpoint: string;

  constructor(endpoint: string) {
    this.rawEndpoint = endpoint;
    this.config = createDefaultConfig(endpoint);
  }

  /**
   * Sets the registry endpoint.
   */
  endpoint(value: string): this {
    this.rawEndpoint = value;
    return this;
  }

  /**
   * Uses plain http for endpoints given without a scheme.
   */
  insecure(value = true): this {
    this.insecureEndpoint = value;
    return this;
  }

  /**
   * Sets the request timeout.
   */
  timeout(value: number): this {
    this.config = { ...this.config, timeout: value };
    return this;
  }

  /**
   * Sets the token acquisition timeout.
   */
  tokenTimeout(value: number): this {
    this.config = { ...this.config, tokenTimeout: value };
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(value: string): this {
    this.config = { ...this.config, userAgent: value };
    return this;
  }

  /**
   * Sets the manifest media types offered to the registry.
   */
  manifestMediaTypes(value: readonly string[]): this {
    this.config = { ...this.config, manifestMediaTypes: [...value] };
    return this;
  }

  /**
   * Sets the largest accepted manifest body.
   */
  maxManifestBytes(value: number): this {
    this.config = { ...this.config, maxManifestBytes: value };
    return this;
  }

  /**
   * Sets the default listing page size.
   */
  pageSize(value: number): this {
    this.config = { ...this.config, pageSize: value };
    return this;
  }

  tokenExpiryMargin(value: number): this {
    this.config = { ...this.config, tokenExpiryMargin: value };
    return this;
  }

  defaultTokenTtl(value: number): this {
    this.config = { ...this.config, defaultTokenTtl: value };
    return this;
  }

  tokenCacheMaxSize(value: number): this {
    this.config = { ...this.config, tokenCacheMaxSize: value };
    return this;
  }

  /**
   * Sets the level of the default logger.
   */
  logLevel(value: LogLevel): this {
    this.config = { ...this.config, logLevel: value };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): RegistryConfig {
    const config: RegistryConfig = {
      ...this.config,
      endpoint: normalizeEndpoint(this.rawEndpoint, this.insecureEndpoint),
    };
    validateConfig(config);
    return config;
  }
}

/**
 * Creates a configuration from environment variables.
 *
 * Reads `REGISTRY_URL` (required), `REGISTRY_INSECURE`, `REGISTRY_TIMEOUT_MS`,
 * `REGISTRY_TOKEN_TIMEOUT_MS`, `REGISTRY_USER_AGENT`, `REGISTRY_PAGE_SIZE` and
 * `REGISTRY_LOG_LEVEL`.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const endpoint = env.REGISTRY_URL;
  if (!endpoint) {
    throw RegistryError.invalidConfig('REGISTRY_URL is not set');
  }

  const builder = new RegistryConfigBuilder(endpoint);

  const insecure = env.REGISTRY_INSECURE;
  if (insecure !== undefined) {
    builder.insecure(insecure === '1' || insecure.toLowerCase() === 'true');
  }

  const timeout = readInt(env, 'REGISTRY_TIMEOUT_MS');
  if (timeout !== undefined) {
    builder.timeout(timeout);
  }

  const tokenTimeout = readInt(env, 'REGISTRY_TOKEN_TIMEOUT_MS');
  if (tokenTimeout !== undefined) {
    builder.tokenTimeout(tokenTimeout);
  }

  if (env.REGISTRY_USER_AGENT) {
    builder.userAgent(env.REGISTRY_USER_AGENT);
  }

  const pageSize = readInt(env, 'REGISTRY_PAGE_SIZE');
  if (pageSize !== undefined) {
    builder.pageSize(pageSize);
  }

  if (env.REGISTRY_LOG_LEVEL) {
    const level = parseLogLevel(env.REGISTRY_LOG_LEVEL);
    if (!level) {
      throw RegistryError.invalidConfig(
        `REGISTRY_LOG_LEVEL has unknown level '${env.REGISTRY_LOG_LEVEL}'`
      );
    }
    builder.logLevel(level);
  }

  return builder.build();
}

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw RegistryError.invalidConfig(`${name} must be an integer, got '${raw}'`);
  }
  return value;
}
