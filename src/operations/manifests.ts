/**
 * Manifest resolution.
 *
 * Fetches a manifest by tag or digest, decides its variant from the media
 * type the registry declares, and verifies the body against the requested
 * digest and the `Docker-Content-Digest` header before anything is parsed.
 *
 * @module operations/manifests
 */

import { Digest } from '../digest/digest.js';
import type { DigestAlgorithm } from '../digest/digest.js';
import { extractJwsPayload } from '../digest/jws.js';
import { RegistryError, RegistryErrorKind, isNotFound } from '../errors.js';
import { readBody } from '../transport/http.js';
import type { TransportResponse } from '../transport/http.js';
import {
  MediaType,
  Platform,
  manifestAcceptHeader,
  manifestKindOf,
  mediaTypeFromDocument,
  parseManifestDocument,
} from '../types/manifest.js';
import type { Manifest, ManifestDescriptor, ManifestListEntry } from '../types/manifest.js';
import { Reference, validateRepository } from '../types/reference.js';
import type { CallOptions, OperationContext } from './context.js';

/**
 * Content types that say nothing about the manifest schema.
 */
const GENERIC_CONTENT_TYPES = new Set([
  'application/json',
  'text/plain',
  'application/octet-stream',
]);

/**
 * Result of a HEAD request for a manifest.
 */
export interface ManifestHead {
  readonly digest?: Digest;
  readonly mediaType?: string;
  readonly size?: number;
}

/**
 * Manifest operations interface.
 */
export interface ManifestResolver {
  /**
   * Fetches and verifies a manifest.
   *
   * @throws {RegistryError} DigestMismatch when the body does not hash to
   * the requested digest or the advertised one; UnsupportedManifestType for
   * media types outside the configured list; InvalidManifest for bodies
   * that do not match their declared schema
   */
  resolve(
    repository: string,
    reference: string | Digest,
    options?: CallOptions
  ): Promise<ManifestDescriptor>;

  /**
   * Resolves a manifest and, when it is a list or index, the child manifest
   * for `platform`. Single-platform manifests are returned as they are.
   */
  resolveForPlatform(
    repository: string,
    reference: string | Digest,
    platform: Platform | string,
    options?: CallOptions
  ): Promise<ManifestDescriptor>;

  /**
   * Fetches a child manifest of a list or index entry, checking its size.
   */
  resolveChild(
    repository: string,
    entry: ManifestListEntry,
    options?: CallOptions
  ): Promise<ManifestDescriptor>;

  /**
   * Gets manifest headers without the body; null when it does not exist.
   */
  head(repository: string, reference: string | Digest, options?: CallOptions): Promise<ManifestHead | null>;

  /**
   * Checks if a manifest exists.
   */
  exists(repository: string, reference: string | Digest, options?: CallOptions): Promise<boolean>;
}

/**
 * Creates manifest operations.
 */
export function createManifestResolver(context: OperationContext): ManifestResolver {
  return new ManifestResolverImpl(context);
}

/**
 * Manifest operations implementation.
 */
class ManifestResolverImpl implements ManifestResolver {
  constructor(private readonly context: OperationContext) {}

  async resolve(
    repository: string,
    reference: string | Digest,
    options: CallOptions = {}
  ): Promise<ManifestDescriptor> {
    validateRepository(repository);
    const ref = Reference.parse(reference);
    const refString = Reference.toString(ref);
    const errorContext = { repository, reference: refString };

    const response = await this.context.pipeline.execute({
      operation: { kind: 'manifest', repository, reference: refString },
      method: 'GET',
      path: `/v2/${repository}/manifests/${refString}`,
      headers: { Accept: manifestAcceptHeader(this.context.config.manifestMediaTypes) },
      signal: options.signal,
    });

    const maxBytes = this.context.config.maxManifestBytes;
    const body = await readBody(response, maxBytes, (max) =>
      RegistryError.invalidManifest(`body exceeds ${max} bytes`, errorContext)
    );
    const document = new LazyDocument(body);

    const mediaType = resolveMediaType(response, document);
    const signedPayload =
      mediaType === MediaType.DockerManifestV1Signed
        ? extractJwsPayload(body, document.require(errorContext))
        : undefined;
    const payload = signedPayload ?? body;

    const advertised = advertisedDigest(response, errorContext);
    const algorithm: DigestAlgorithm =
      ref.kind === 'digest' ? ref.digest.algorithm : advertised?.algorithm ?? 'sha256';
    const digest = Digest.fromBytes(algorithm, payload);

    if (ref.kind === 'digest' && !digest.equals(ref.digest)) {
      throw this.mismatch(ref.digest, digest, errorContext);
    }
    if (advertised) {
      const computed =
        advertised.algorithm === digest.algorithm
          ? digest
          : Digest.fromBytes(advertised.algorithm, payload);
      if (!computed.equals(advertised)) {
        throw this.mismatch(advertised, computed, { ...errorContext, source: 'Docker-Content-Digest' });
      }
    }

    const kind = mediaType === undefined ? undefined : manifestKindOf(mediaType);
    if (
      mediaType === undefined ||
      kind === undefined ||
      !this.context.config.manifestMediaTypes.includes(mediaType)
    ) {
      throw RegistryError.unsupportedManifestType(mediaType ?? '', errorContext);
    }

    // The digest covers only the signed payload, so the manifest is read from it
    const source = signedPayload ? new LazyDocument(signedPayload) : document;
    const parsed = parseManifestDocument(kind, source.require(errorContext));
    if (!parsed.success) {
      throw RegistryError.invalidManifest(parsed.reason, { ...errorContext, mediaType });
    }
    const manifest: Manifest =
      signedPayload && parsed.manifest.kind === 'schema1'
        ? { ...parsed.manifest, signed: true }
        : parsed.manifest;

    this.context.logger.debug('Manifest resolved', {
      repository,
      reference: refString,
      mediaType,
      digest: digest.toString(),
    });

    return { mediaType, digest, body, manifest };
  }

  async resolveForPlatform(
    repository: string,
    reference: string | Digest,
    platform: Platform | string,
    options: CallOptions = {}
  ): Promise<ManifestDescriptor> {
    const wanted = typeof platform === 'string' ? Platform.parse(platform) : platform;
    if (!wanted) {
      throw RegistryError.invalidReference(
        `Invalid platform '${String(platform)}': expected os/arch[/variant]`,
        String(platform)
      );
    }

    const descriptor = await this.resolve(repository, reference, options);
    if (descriptor.manifest.kind !== 'list') {
      return descriptor;
    }

    const entry = descriptor.manifest.manifests.find(
      (candidate) => candidate.platform !== undefined && Platform.matches(wanted, candidate.platform)
    );
    if (!entry) {
      throw new RegistryError(
        RegistryErrorKind.ManifestNotFound,
        `No manifest for platform ${Platform.toString(wanted)} in ${repository}@${descriptor.digest.toString()}`,
        {
          context: {
            repository,
            reference: String(reference),
            platform: Platform.toString(wanted),
          },
        }
      );
    }

    return this.resolveChild(repository, entry, options);
  }

  async resolveChild(
    repository: string,
    entry: ManifestListEntry,
    options: CallOptions = {}
  ): Promise<ManifestDescriptor> {
    const child = await this.resolve(repository, entry.digest, options);
    if (child.body.byteLength !== entry.size) {
      throw RegistryError.sizeMismatch(entry.digest.toString(), entry.size, child.body.byteLength);
    }
    return child;
  }

  async head(
    repository: string,
    reference: string | Digest,
    options: CallOptions = {}
  ): Promise<ManifestHead | null> {
    validateRepository(repository);
    const refString = Reference.toString(Reference.parse(reference));

    let response: TransportResponse;
    try {
      response = await this.context.pipeline.execute({
        operation: { kind: 'manifest', repository, reference: refString },
        method: 'HEAD',
        path: `/v2/${repository}/manifests/${refString}`,
        headers: { Accept: manifestAcceptHeader(this.context.config.manifestMediaTypes) },
        signal: options.signal,
      });
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
    await response.discard();

    const digest = advertisedDigest(response, { repository, reference: refString });
    const contentType = response.headers.get('content-type');
    const contentLength = response.headers.get('content-length');
    const size = contentLength === null ? undefined : Number(contentLength);

    return {
      ...(digest ? { digest } : {}),
      ...(contentType ? { mediaType: stripParameters(contentType) } : {}),
      ...(size !== undefined && Number.isInteger(size) ? { size } : {}),
    };
  }

  async exists(
    repository: string,
    reference: string | Digest,
    options: CallOptions = {}
  ): Promise<boolean> {
    return (await this.head(repository, reference, options)) !== null;
  }

  private mismatch(
    expected: Digest,
    actual: Digest,
    context: Record<string, unknown>
  ): RegistryError {
    this.context.logger.warn('Manifest digest mismatch', {
      ...context,
      expected: expected.toString(),
      actual: actual.toString(),
    });
    return RegistryError.digestMismatch(expected.toString(), actual.toString(), context);
  }
}

/**
 * JSON body parsed on first use.
 */
class LazyDocument {
  private parsed = false;
  private value: unknown;
  private failure?: unknown;

  constructor(private readonly body: Uint8Array) {}

  /**
   * The parsed document, or undefined when the body is not JSON.
   */
  get(): unknown {
    if (!this.parsed) {
      this.parsed = true;
      try {
        this.value = JSON.parse(Buffer.from(this.body).toString('utf8'));
      } catch (error) {
        this.failure = error;
      }
    }
    return this.value;
  }

  /**
   * The parsed document.
   *
   * @throws {RegistryError} InvalidManifest when the body is not JSON
   */
  require(context: Record<string, unknown>): unknown {
    const value = this.get();
    if (this.failure !== undefined) {
      throw RegistryError.invalidManifest('body is not valid JSON', context, this.failure);
    }
    return value;
  }
}

function stripParameters(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

/**
 * The declared Content-Type decides; generic or missing types fall back to
 * the document's own `mediaType` or `schemaVersion`.
 */
function resolveMediaType(response: TransportResponse, document: LazyDocument): string | undefined {
  const header = response.headers.get('content-type');
  const declared = header ? stripParameters(header) : '';
  if (declared && !GENERIC_CONTENT_TYPES.has(declared)) {
    return declared;
  }
  return mediaTypeFromDocument(document.get());
}

function advertisedDigest(
  response: TransportResponse,
  context: Record<string, unknown>
): Digest | undefined {
  const header = response.headers.get('docker-content-digest');
  if (!header) {
    return undefined;
  }
  const digest = Digest.tryParse(header.trim());
  if (!digest) {
    throw RegistryError.invalidResponse(`malformed Docker-Content-Digest '${header}'`, context);
  }
  return digest;
}
