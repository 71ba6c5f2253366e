/**
 * Registry credentials and the providers that supply them.
 * @module auth/credentials
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { RegistryError, RegistryErrorKind } from '../errors.js';
import { SecretString } from './secret.js';

/**
 * Credential presented to a registry.
 *
 * `basic` is the caller's static username and secret, used directly for
 * Basic challenges and as the authentication of bearer token requests.
 * `bearer` is a token supplied up front; it is sent on every request and
 * never renegotiated.
 */
export type Credential =
  | { readonly type: 'none' }
  | { readonly type: 'basic'; readonly username: string; readonly password: SecretString }
  | { readonly type: 'bearer'; readonly token: SecretString; readonly expiresAt?: number };

/**
 * Credential factory functions.
 */
export const Credential = {
  none(): Credential {
    return { type: 'none' };
  },

  basic(username: string, password: string | SecretString): Credential {
    return {
      type: 'basic',
      username,
      password: typeof password === 'string' ? new SecretString(password) : password,
    };
  },

  bearer(token: string | SecretString, expiresAt?: number): Credential {
    const secret = typeof token === 'string' ? new SecretString(token) : token;
    return expiresAt === undefined
      ? { type: 'bearer', token: secret }
      : { type: 'bearer', token: secret, expiresAt };
  },

  /**
   * Value of the `Authorization` header for a Basic credential.
   */
  basicHeader(username: string, password: SecretString): string {
    return `Basic ${Buffer.from(`${username}:${password.expose()}`, 'utf8').toString('base64')}`;
  },
};

/**
 * Source of static credentials.
 */
export interface CredentialProvider {
  /**
   * Gets the current credential.
   */
  getCredential(): Promise<Credential>;

  /**
   * Drops any cached credential.
   */
  invalidate(): void;

  /**
   * Checks if a credential is available.
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Provider returning a fixed credential.
 */
export class StaticCredentialProvider implements CredentialProvider {
  constructor(private readonly credential: Credential) {}

  async getCredential(): Promise<Credential> {
    return this.credential;
  }

  invalidate(): void {
    // Static credentials cannot be invalidated
  }

  async isAvailable(): Promise<boolean> {
    return this.credential.type !== 'none';
  }

  static anonymous(): StaticCredentialProvider {
    return new StaticCredentialProvider(Credential.none());
  }

  static basic(username: string, password: string): StaticCredentialProvider {
    return new StaticCredentialProvider(Credential.basic(username, password));
  }
}

/**
 * Provider reading a username and password from environment variables.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(
    private readonly usernameVar: string = 'REGISTRY_USERNAME',
    private readonly passwordVar: string = 'REGISTRY_PASSWORD',
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async getCredential(): Promise<Credential> {
    const username = this.env[this.usernameVar];
    const password = this.env[this.passwordVar];

    if (!username) {
      throw RegistryError.authenticationFailed(
        `Environment variable ${this.usernameVar} not set`
      );
    }
    if (!password) {
      throw RegistryError.authenticationFailed(
        `Environment variable ${this.passwordVar} not set`
      );
    }

    return Credential.basic(username, password);
  }

  invalidate(): void {
    // Environment variables are re-read each time
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.env[this.usernameVar]) && Boolean(this.env[this.passwordVar]);
  }
}

const dockerConfigSchema = z.object({
  auths: z
    .record(
      z
        .object({
          auth: z.string().optional(),
          username: z.string().optional(),
          password: z.string().optional(),
          registrytoken: z.string().optional(),
        })
        .passthrough()
    )
    .default({}),
});

/**
 * Options for DockerConfigCredentialProvider.
 */
export interface DockerConfigOptions {
  /** Path of the config file, default `$DOCKER_CONFIG/config.json` or `~/.docker/config.json` */
  path?: string;
  /** File contents, used instead of reading `path` */
  content?: string;
}

/**
 * Provider reading the `auths` section of a docker `config.json`.
 *
 * Entries are matched by registry host, so `https://index.docker.io/v1/`
 * serves `registry-1.docker.io`. Credential helpers (`credsStore`,
 * `credHelpers`) are not consulted.
 */
export class DockerConfigCredentialProvider implements CredentialProvider {
  private cached?: Credential;

  constructor(
    private readonly registry: string,
    private readonly options: DockerConfigOptions = {}
  ) {}

  async getCredential(): Promise<Credential> {
    if (this.cached) {
      return this.cached;
    }
    const credential = await this.load();
    this.cached = credential;
    return credential;
  }

  invalidate(): void {
    this.cached = undefined;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const credential = await this.getCredential();
      return credential.type !== 'none';
    } catch (error) {
      if (error instanceof RegistryError) {
        return false;
      }
      throw error;
    }
  }

  private async load(): Promise<Credential> {
    const content = this.options.content ?? (await this.readConfigFile());

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new RegistryError(RegistryErrorKind.InvalidConfig, 'Docker config is not valid JSON', {
        cause: error,
      });
    }

    const parsed = dockerConfigSchema.safeParse(document);
    if (!parsed.success) {
      throw RegistryError.invalidConfig('Docker config has an invalid "auths" section');
    }

    const wanted = registryHost(this.registry);
    for (const [key, entry] of Object.entries(parsed.data.auths)) {
      if (registryHost(key) !== wanted) {
        continue;
      }
      if (entry.registrytoken) {
        return Credential.bearer(entry.registrytoken);
      }
      if (entry.auth) {
        return decodeAuthField(entry.auth, key);
      }
      if (entry.username && entry.password) {
        return Credential.basic(entry.username, entry.password);
      }
    }
    return Credential.none();
  }

  private async readConfigFile(): Promise<string> {
    const path =
      this.options.path ??
      join(process.env.DOCKER_CONFIG ?? join(homedir(), '.docker'), 'config.json');
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw new RegistryError(
        RegistryErrorKind.InvalidConfig,
        `Cannot read docker config at ${path}`,
        { cause: error }
      );
    }
  }
}

/**
 * Decodes the base64 `user:password` form of a docker config `auth` field.
 */
export function decodeAuthField(auth: string, key = 'auth'): Credential {
  const decoded = Buffer.from(auth, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator <= 0) {
    throw RegistryError.invalidConfig(`Docker config entry '${key}' has a malformed auth field`);
  }
  return Credential.basic(decoded.slice(0, separator), decoded.slice(separator + 1));
}

/**
 * Reduces a registry URL or host to a comparable host name.
 */
export function registryHost(value: string): string {
  let host = value.trim().toLowerCase();
  host = host.replace(/^[a-z][a-z0-9+.-]*:\/\//, '');
  const slash = host.indexOf('/');
  if (slash >= 0) {
    host = host.slice(0, slash);
  }
  if (host === 'docker.io' || host === 'index.docker.io' || host === 'registry-1.docker.io') {
    return 'docker.io';
  }
  return host;
}

/**
 * Chain of credential providers.
 * Tries each provider in order until one has a credential.
 */
export class ChainCredentialProvider implements CredentialProvider {
  private readonly providers: CredentialProvider[];
  private cached?: Credential;

  constructor(providers: CredentialProvider[]) {
    if (providers.length === 0) {
      throw RegistryError.invalidConfig('ChainCredentialProvider requires at least one provider');
    }
    this.providers = providers;
  }

  async getCredential(): Promise<Credential> {
    if (this.cached) {
      return this.cached;
    }

    for (const provider of this.providers) {
      if (!(await provider.isAvailable())) {
        continue;
      }
      const credential = await provider.getCredential();
      this.cached = credential;
      return credential;
    }

    return Credential.none();
  }

  invalidate(): void {
    this.cached = undefined;
    for (const provider of this.providers) {
      provider.invalidate();
    }
  }

  async isAvailable(): Promise<boolean> {
    for (const provider of this.providers) {
      if (await provider.isAvailable()) {
        return true;
      }
    }
    return false;
  }

  /**
   * Environment variables first, then the docker config for `registry`.
   */
  static defaultChain(
    registry: string,
    env: NodeJS.ProcessEnv = process.env
  ): ChainCredentialProvider {
    return new ChainCredentialProvider([
      new EnvCredentialProvider('REGISTRY_USERNAME', 'REGISTRY_PASSWORD', env),
      new DockerConfigCredentialProvider(registry),
    ]);
  }
}
