/**
 * Tests for credentials and credential providers.
 */

import { describe, it, expect } from 'vitest';
import {
  ChainCredentialProvider,
  Credential,
  DockerConfigCredentialProvider,
  EnvCredentialProvider,
  StaticCredentialProvider,
  decodeAuthField,
  registryHost,
} from '../credentials.js';
import { SecretString } from '../secret.js';
import { RegistryErrorKind } from '../../errors.js';

function basicAuth(username: string, password: string): string {
  return Buffer.from(`${username}:${password}`).toString('base64');
}

describe('Credential', () => {
  it('should build a Basic authorization header', () => {
    const header = Credential.basicHeader('user', new SecretString('test-secret'));
    expect(header).toBe(`Basic ${basicAuth('user', 'test-secret')}`);
  });

  it('should wrap passwords in SecretString', () => {
    const credential = Credential.basic('user', 'test-secret');
    expect(credential.type).toBe('basic');
    expect(JSON.stringify(credential)).toBe('{"type":"basic","username":"user","password":"***"}');
  });
});

describe('SecretString', () => {
  it('should hide its value', () => {
    const secret = new SecretString('test-secret');
    expect(String(secret)).toBe('***');
    expect(`${secret}`).toBe('***');
    expect(secret.expose()).toBe('test-secret');
    expect(secret.length).toBe(11);
    expect(secret.equals(new SecretString('test-secret'))).toBe(true);
    expect(new SecretString('').isEmpty()).toBe(true);
  });
});

describe('StaticCredentialProvider', () => {
  it('should report anonymous as unavailable', async () => {
    const provider = StaticCredentialProvider.anonymous();
    expect(await provider.isAvailable()).toBe(false);
    expect(await provider.getCredential()).toEqual({ type: 'none' });
  });

  it('should return its basic credential', async () => {
    const provider = StaticCredentialProvider.basic('user', 'test-secret');
    const credential = await provider.getCredential();
    expect(await provider.isAvailable()).toBe(true);
    expect(credential.type === 'basic' && credential.password.expose()).toBe('test-secret');
  });
});

describe('EnvCredentialProvider', () => {
  it('should read the default variables', async () => {
    const provider = new EnvCredentialProvider(undefined, undefined, {
      REGISTRY_USERNAME: 'user',
      REGISTRY_PASSWORD: 'test-secret',
    });
    expect(await provider.isAvailable()).toBe(true);
    const credential = await provider.getCredential();
    expect(credential.type === 'basic' && credential.username).toBe('user');
  });

  it('should fail when a variable is missing', async () => {
    const provider = new EnvCredentialProvider('U', 'P', { U: 'user' });
    expect(await provider.isAvailable()).toBe(false);
    await expect(provider.getCredential()).rejects.toThrow('Environment variable P not set');
  });
});

describe('DockerConfigCredentialProvider', () => {
  it('should decode the auth field of the matching entry', async () => {
    const content = JSON.stringify({
      auths: {
        'other.example': { auth: basicAuth('someone', 'other-secret') },
        'registry.example:5000': { auth: basicAuth('user', 'test-secret') },
      },
    });
    const provider = new DockerConfigCredentialProvider('https://registry.example:5000', { content });

    const credential = await provider.getCredential();

    expect(credential.type).toBe('basic');
    if (credential.type === 'basic') {
      expect(credential.username).toBe('user');
      expect(credential.password.expose()).toBe('test-secret');
    }
  });

  it('should map the Docker Hub index entry to the registry host', async () => {
    const content = JSON.stringify({
      auths: { 'https://index.docker.io/v1/': { auth: basicAuth('user', 'test-secret') } },
    });
    const provider = new DockerConfigCredentialProvider('https://registry-1.docker.io', { content });
    expect(await provider.isAvailable()).toBe(true);
  });

  it('should prefer an identity token', async () => {
    const content = JSON.stringify({
      auths: { 'registry.example': { auth: basicAuth('user', 'x'), registrytoken: 'test-token' } },
    });
    const provider = new DockerConfigCredentialProvider('registry.example', { content });
    const credential = await provider.getCredential();
    expect(credential.type === 'bearer' && credential.token.expose()).toBe('test-token');
  });

  it('should use explicit username and password', async () => {
    const content = JSON.stringify({
      auths: { 'registry.example': { username: 'user', password: 'test-secret' } },
    });
    const provider = new DockerConfigCredentialProvider('registry.example', { content });
    const credential = await provider.getCredential();
    expect(credential.type === 'basic' && credential.username).toBe('user');
  });

  it('should return none without a matching entry', async () => {
    const provider = new DockerConfigCredentialProvider('registry.example', {
      content: '{"auths":{}}',
    });
    expect(await provider.getCredential()).toEqual({ type: 'none' });
    expect(await provider.isAvailable()).toBe(false);
  });

  it('should reject invalid JSON', async () => {
    const provider = new DockerConfigCredentialProvider('registry.example', { content: '{' });
    await expect(provider.getCredential()).rejects.toMatchObject({
      kind: RegistryErrorKind.InvalidConfig,
    });
    expect(await provider.isAvailable()).toBe(false);
  });
});

describe('ChainCredentialProvider', () => {
  it('should use the first available provider', async () => {
    const chain = new ChainCredentialProvider([
      StaticCredentialProvider.anonymous(),
      new EnvCredentialProvider('U', 'P', {}),
      StaticCredentialProvider.basic('user', 'test-secret'),
    ]);
    const credential = await chain.getCredential();
    expect(credential.type === 'basic' && credential.username).toBe('user');
  });

  it('should fall back to anonymous', async () => {
    const chain = new ChainCredentialProvider([StaticCredentialProvider.anonymous()]);
    expect(await chain.getCredential()).toEqual({ type: 'none' });
    expect(await chain.isAvailable()).toBe(false);
  });

  it('should read the given environment first in the default chain', async () => {
    const chain = ChainCredentialProvider.defaultChain('https://registry.example', {
      REGISTRY_USERNAME: 'user',
      REGISTRY_PASSWORD: 'test-secret',
    });
    const credential = await chain.getCredential();
    expect(credential.type === 'basic' && credential.password.expose()).toBe('test-secret');
  });

  it('should require at least one provider', () => {
    expect(() => new ChainCredentialProvider([])).toThrow(
      'ChainCredentialProvider requires at least one provider'
    );
  });
});

describe('helpers', () => {
  it('should decode user and password, keeping colons in the password', () => {
    const credential = decodeAuthField(basicAuth('user', 'a:b'));
    expect(credential.type === 'basic' && credential.password.expose()).toBe('a:b');
  });

  it('should reject an auth field without separator', () => {
    expect(() => decodeAuthField(Buffer.from('user').toString('base64'), 'host')).toThrow(
      "Docker config entry 'host' has a malformed auth field"
    );
  });

  it('should reduce URLs to hosts', () => {
    expect(registryHost('https://Registry.Example:5000/v2/')).toBe('registry.example:5000');
    expect(registryHost('index.docker.io')).toBe('docker.io');
  });
});
