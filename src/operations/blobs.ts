/**
 * Blob retrieval as digest-verified byte streams.
 * @module operations/blobs
 */

import { Digest } from '../digest/digest.js';
import { RegistryError, RegistryErrorKind, isNotFound, isRegistryError } from '../errors.js';
import type { Logger } from '../observability/logging.js';
import type { TransportResponse } from '../transport/http.js';
import { validateRepository } from '../types/reference.js';
import type { CallOptions, OperationContext } from './context.js';

/**
 * Verification outcome of a blob stream.
 *
 * `pending` until the stream has been drained; a stream abandoned early
 * stays `pending` and its bytes carry no integrity guarantee.
 */
export type VerificationState = 'pending' | 'verified' | 'failed';

/**
 * Options for fetching a blob.
 */
export interface GetBlobOptions extends CallOptions {
  /** Size known from a descriptor; checked against the bytes received */
  readonly size?: number;
}

/**
 * Result of a HEAD request for a blob.
 */
export interface BlobHead {
  readonly digest: Digest;
  readonly size?: number;
}

interface BlobStreamInit {
  readonly repository: string;
  readonly digest: Digest;
  readonly response: TransportResponse;
  /** Total bytes expected, when known */
  readonly size?: number;
  readonly mediaType?: string;
  readonly signal?: AbortSignal;
  readonly logger: Logger;
}

/**
 * A blob's bytes, verified as they are read.
 *
 * Single pass: iterate it once, or fetch the blob again to restart. Every
 * chunk is hashed before it is yielded. When the body ends, the stream
 * fails instead of completing if fewer bytes than expected arrived
 * (TruncatedBlob), more arrived (SizeMismatch), or the hash differs from
 * the requested digest (DigestMismatch). Chunks already consumed are only
 * trustworthy once the iteration finished without error; a caller that
 * persisted them earlier must discard them on failure.
 *
 * @example
 * ```typescript
 * const blob = await client.getBlob('library/alpine', digest);
 * for await (const chunk of blob) {
 *   await file.write(chunk);
 * }
 * // reaching here means the content matched `digest`
 * ```
 */
export class BlobStream implements AsyncIterable<Uint8Array> {
  readonly repository: string;
  readonly digest: Digest;
  /** Expected size in bytes, when known */
  readonly size?: number;
  readonly mediaType?: string;

  private readonly response: TransportResponse;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;
  private iterator?: AsyncGenerator<Uint8Array, void, undefined>;
  private verification: VerificationState = 'pending';
  private reading = false;
  private received = 0;

  constructor(init: BlobStreamInit) {
    this.repository = init.repository;
    this.digest = init.digest;
    this.size = init.size;
    this.mediaType = init.mediaType;
    this.response = init.response;
    this.signal = init.signal;
    this.logger = init.logger;
  }

  get state(): VerificationState {
    return this.verification;
  }

  /** Bytes yielded so far. */
  get bytesReceived(): number {
    return this.received;
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    if (this.iterator) {
      throw RegistryError.invalidState(
        `Blob stream for ${this.digest.toString()} was already consumed; fetch it again to restart`
      );
    }
    this.iterator = this.chunks();
    return this.iterator;
  }

  /**
   * Drains the stream and returns the verified content.
   */
  async readAll(): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    for await (const chunk of this) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks, this.received);
  }

  /**
   * Releases the underlying response. The stream stays unverified.
   */
  async cancel(): Promise<void> {
    if (this.reading && this.iterator) {
      await this.iterator.return(undefined);
      return;
    }
    if (this.iterator) {
      // Created but never advanced; returning it keeps it from starting
      await this.iterator.return(undefined);
    } else {
      this.iterator = emptyGenerator();
    }
    await this.response.discard();
  }

  private async *chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    this.reading = true;
    const accumulator = this.digest.accumulator();

    try {
      for await (const chunk of this.response.body) {
        accumulator.update(chunk);
        this.received += chunk.byteLength;
        if (this.size !== undefined && this.received > this.size) {
          throw RegistryError.sizeMismatch(this.digest.toString(), this.size, this.received);
        }
        yield chunk;
      }
    } catch (error) {
      throw this.fail(this.readFailure(error));
    }

    if (this.size !== undefined && this.received < this.size) {
      throw this.fail(RegistryError.truncatedBlob(this.digest.toString(), this.size, this.received));
    }

    const actual = accumulator.finalize();
    if (!actual.equals(this.digest)) {
      throw this.fail(
        RegistryError.digestMismatch(this.digest.toString(), actual.toString(), {
          repository: this.repository,
          digest: this.digest.toString(),
        })
      );
    }

    this.verification = 'verified';
  }

  /**
   * A connection lost before the expected size arrived is a truncation,
   * unless the caller aborted.
   */
  private readFailure(error: unknown): unknown {
    if (
      isRegistryError(error) &&
      error.kind === RegistryErrorKind.TransportError &&
      this.size !== undefined &&
      this.received < this.size &&
      !this.signal?.aborted
    ) {
      return new RegistryError(
        RegistryErrorKind.TruncatedBlob,
        `Blob ${this.digest.toString()} ended after ${this.received} of ${this.size} bytes`,
        {
          cause: error,
          context: { digest: this.digest.toString(), expected: this.size, actual: this.received },
        }
      );
    }
    return error;
  }

  private fail(error: unknown): unknown {
    this.verification = 'failed';
    if (isRegistryError(error)) {
      this.logger.warn('Blob verification failed', {
        repository: this.repository,
        digest: this.digest.toString(),
        kind: error.kind,
        bytesReceived: this.received,
      });
    }
    return error;
  }
}

async function* emptyGenerator(): AsyncGenerator<Uint8Array, void, undefined> {
  // Placeholder iterator for a cancelled stream
}

/**
 * Blob operations interface.
 */
export interface BlobStreamer {
  /**
   * Opens a blob as a verified stream.
   *
   * @throws {RegistryError} BlobNotFound, or SizeMismatch when the
   * advertised length contradicts `options.size`
   */
  get(repository: string, digest: string | Digest, options?: GetBlobOptions): Promise<BlobStream>;

  /**
   * Gets blob headers without the body; null when it does not exist.
   */
  head(repository: string, digest: string | Digest, options?: CallOptions): Promise<BlobHead | null>;

  /**
   * Checks if a blob exists.
   */
  exists(repository: string, digest: string | Digest, options?: CallOptions): Promise<boolean>;
}

/**
 * Creates blob operations.
 */
export function createBlobStreamer(context: OperationContext): BlobStreamer {
  return new BlobStreamerImpl(context);
}

/**
 * Blob operations implementation.
 */
class BlobStreamerImpl implements BlobStreamer {
  constructor(private readonly context: OperationContext) {}

  async get(
    repository: string,
    digest: string | Digest,
    options: GetBlobOptions = {}
  ): Promise<BlobStream> {
    validateRepository(repository);
    const wanted = typeof digest === 'string' ? Digest.parse(digest) : digest;

    const response = await this.context.pipeline.execute({
      operation: { kind: 'blob', repository, digest: wanted.toString() },
      method: 'GET',
      path: `/v2/${repository}/blobs/${wanted.toString()}`,
      signal: options.signal,
    });

    const advertised = response.headers.get('docker-content-digest');
    if (advertised) {
      const parsed = Digest.tryParse(advertised.trim());
      if (parsed && parsed.algorithm === wanted.algorithm && !parsed.equals(wanted)) {
        await response.discard();
        throw RegistryError.digestMismatch(wanted.toString(), parsed.toString(), {
          repository,
          source: 'Docker-Content-Digest',
        });
      }
    }

    const contentLength = declaredLength(response);
    if (
      options.size !== undefined &&
      contentLength !== undefined &&
      options.size !== contentLength
    ) {
      await response.discard();
      throw RegistryError.sizeMismatch(wanted.toString(), options.size, contentLength);
    }

    const contentType = response.headers.get('content-type');

    return new BlobStream({
      repository,
      digest: wanted,
      response,
      size: options.size ?? contentLength,
      mediaType: contentType ?? undefined,
      signal: options.signal,
      logger: this.context.logger,
    });
  }

  async head(
    repository: string,
    digest: string | Digest,
    options: CallOptions = {}
  ): Promise<BlobHead | null> {
    validateRepository(repository);
    const wanted = typeof digest === 'string' ? Digest.parse(digest) : digest;

    let response: TransportResponse;
    try {
      response = await this.context.pipeline.execute({
        operation: { kind: 'blob', repository, digest: wanted.toString() },
        method: 'HEAD',
        path: `/v2/${repository}/blobs/${wanted.toString()}`,
        signal: options.signal,
      });
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
    await response.discard();

    const size = declaredLength(response);
    return size === undefined ? { digest: wanted } : { digest: wanted, size };
  }

  async exists(
    repository: string,
    digest: string | Digest,
    options: CallOptions = {}
  ): Promise<boolean> {
    return (await this.head(repository, digest, options)) !== null;
  }
}

/**
 * Content-Length of an identity-encoded body. With a Content-Encoding the
 * header counts encoded bytes, which the transport may have decoded.
 */
function declaredLength(response: TransportResponse): number | undefined {
  const encoding = response.headers.get('content-encoding');
  if (encoding && encoding.toLowerCase() !== 'identity') {
    return undefined;
  }
  const header = response.headers.get('content-length');
  if (header === null) {
    return undefined;
  }
  const value = Number(header);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}
