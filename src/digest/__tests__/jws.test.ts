/**
 * Tests for schema 1 JWS payload extraction.
 */

import { describe, it, expect } from 'vitest';
import { extractJwsPayload } from '../jws.js';
import { RegistryErrorKind } from '../../errors.js';
import { signSchema1 } from '../../__tests__/fixtures.js';

const document = {
  schemaVersion: 1,
  name: 'team/app',
  tag: 'v1',
  architecture: 'amd64',
  fsLayers: [{ blobSum: `sha256:${'a'.repeat(64)}` }],
};

function encode(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

describe('extractJwsPayload', () => {
  it('should rebuild the payload from the protected header', () => {
    const signed = signSchema1(document);
    const body = Buffer.from(signed.body, 'utf8');

    const payload = extractJwsPayload(body, JSON.parse(signed.body));

    expect(payload).toBeDefined();
    expect(Buffer.from(payload ?? new Uint8Array()).toString('utf8')).toBe(signed.payload);
  });

  it('should accept several signatures that agree', () => {
    const signed = signSchema1(document, 2);
    const payload = extractJwsPayload(Buffer.from(signed.body), JSON.parse(signed.body));
    expect(Buffer.from(payload ?? new Uint8Array()).toString('utf8')).toBe(signed.payload);
  });

  it('should return undefined without signatures', () => {
    const body = JSON.stringify(document);
    expect(extractJwsPayload(Buffer.from(body), document)).toBeUndefined();
  });

  it('should return undefined when no signature has a protected header', () => {
    const withSignatures = { ...document, signatures: [{ signature: 'test-signature' }] };
    const body = JSON.stringify(withSignatures);
    expect(extractJwsPayload(Buffer.from(body), withSignatures)).toBeUndefined();
  });

  it('should reject signatures that disagree on formatLength', () => {
    const body = Buffer.from('{"schemaVersion": 1}');
    const doc = {
      signatures: [
        { protected: encode({ formatLength: 5, formatTail: 'fQ' }) },
        { protected: encode({ formatLength: 6, formatTail: 'fQ' }) },
      ],
    };
    expect(() => extractJwsPayload(body, doc)).toThrow(
      expect.objectContaining({ kind: RegistryErrorKind.InvalidManifest })
    );
  });

  it('should reject a formatLength past the end of the body', () => {
    const body = Buffer.from('{}');
    const doc = { signatures: [{ protected: encode({ formatLength: 10, formatTail: 'fQ' }) }] };
    expect(() => extractJwsPayload(body, doc)).toThrow(
      'Invalid manifest: formatLength 10 exceeds body length 2'
    );
  });

  it('should reject a protected header that is not JSON', () => {
    const doc = { signatures: [{ protected: Buffer.from('not json').toString('base64url') }] };
    expect(() => extractJwsPayload(Buffer.from('{}'), doc)).toThrow(
      'Invalid manifest: signatures[0].protected is not base64url JSON'
    );
  });
});
