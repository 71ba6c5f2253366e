/**
 * Manifest and registry fixtures shared by the tests.
 * @module __tests__/fixtures
 */

import { Digest } from '../digest/digest.js';

/**
 * A schema 1 manifest signed the way `prettyjws` bodies are: the signatures
 * are spliced in before the closing brace of the pretty-printed payload.
 */
export interface SignedSchema1 {
  /** Body as served, signatures included */
  readonly body: string;
  /** Payload the digest covers */
  readonly payload: string;
  readonly digest: Digest;
}

/**
 * Builds a signed schema 1 manifest for `document`.
 */
export function signSchema1(document: Record<string, unknown>, signatureCount = 1): SignedSchema1 {
  const payload = JSON.stringify(document, null, 3);
  const formatLength = payload.length - 2;
  const formatTail = Buffer.from(payload.slice(formatLength), 'utf8').toString('base64url');
  const protectedHeader = Buffer.from(
    JSON.stringify({ formatLength, formatTail, time: '2024-01-01T00:00:00Z' }),
    'utf8'
  ).toString('base64url');

  const signatures = Array.from({ length: signatureCount }, (_, index) => ({
    header: { alg: 'ES256' },
    signature: `test-signature-${index}`,
    protected: protectedHeader,
  }));

  const body = `${payload.slice(0, formatLength)},\n   "signatures": ${JSON.stringify(signatures)}\n}`;
  return { body, payload, digest: Digest.sha256(payload) };
}

/**
 * A docker schema 2 image manifest referencing the given blobs.
 */
export function schema2Manifest(config: string, layers: readonly string[]): string {
  return JSON.stringify({
    schemaVersion: 2,
    mediaType: 'application/vnd.docker.distribution.manifest.v2+json',
    config: {
      mediaType: 'application/vnd.docker.container.image.v1+json',
      size: Buffer.byteLength(config),
      digest: Digest.sha256(config).toString(),
    },
    layers: layers.map((layer) => ({
      mediaType: 'application/vnd.docker.image.rootfs.diff.tar.gzip',
      size: Buffer.byteLength(layer),
      digest: Digest.sha256(layer).toString(),
    })),
  });
}

/**
 * An OCI image index whose entries point at the given manifest bodies.
 */
export function ociIndex(
  entries: ReadonlyArray<{ body: string; os: string; architecture: string; variant?: string }>
): string {
  return JSON.stringify({
    schemaVersion: 2,
    mediaType: 'application/vnd.oci.image.index.v1+json',
    manifests: entries.map((entry) => ({
      mediaType: 'application/vnd.oci.image.manifest.v1+json',
      size: Buffer.byteLength(entry.body),
      digest: Digest.sha256(entry.body).toString(),
      platform: {
        os: entry.os,
        architecture: entry.architecture,
        ...(entry.variant ? { variant: entry.variant } : {}),
      },
    })),
  });
}
