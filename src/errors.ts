/**
 * Error types for the registry client.
 * @module errors
 */

/**
 * Error kinds for categorizing registry errors.
 */
export enum RegistryErrorKind {
  // Input errors
  MalformedDigest = 'malformed_digest',
  InvalidReference = 'invalid_reference',

  // Authentication errors
  MalformedChallenge = 'malformed_challenge',
  AuthServerError = 'auth_server_error',
  AuthenticationFailed = 'authentication_failed',

  // Resource errors
  RepositoryNotFound = 'repository_not_found',
  ManifestNotFound = 'manifest_not_found',
  BlobNotFound = 'blob_not_found',

  // Integrity errors
  DigestMismatch = 'digest_mismatch',
  TruncatedBlob = 'truncated_blob',
  SizeMismatch = 'size_mismatch',

  // Protocol errors
  UnsupportedManifestType = 'unsupported_manifest_type',
  InvalidManifest = 'invalid_manifest',
  InvalidResponse = 'invalid_response',
  RegistryRejected = 'registry_rejected',

  // Server and network errors
  Transient = 'transient',
  TransportError = 'transport_error',

  // Configuration and usage errors
  InvalidConfig = 'invalid_config',
  InvalidState = 'invalid_state',
}

/**
 * Which resource a 404 refers to.
 */
export type NotFoundTarget = 'manifest' | 'blob' | 'repository';

const NOT_FOUND_KINDS: Record<NotFoundTarget, RegistryErrorKind> = {
  manifest: RegistryErrorKind.ManifestNotFound,
  blob: RegistryErrorKind.BlobNotFound,
  repository: RegistryErrorKind.RepositoryNotFound,
};

/**
 * Maximum number of characters of a response body kept on an error.
 */
export const MAX_ERROR_BODY_LENGTH = 4096;

/**
 * Entry of a registry error body (`{"errors":[...]}`).
 */
export interface RegistryErrorDetail {
  code: string;
  message?: string;
  detail?: unknown;
}

/**
 * Error options for RegistryError constructor.
 */
export interface RegistryErrorOptions {
  /** HTTP status code */
  statusCode?: number;
  /** Retry-After value in seconds */
  retryAfter?: number;
  /** Raw response body, truncated */
  body?: string;
  /** Parsed registry error entries */
  registryErrors?: RegistryErrorDetail[];
  /** Underlying cause */
  cause?: unknown;
  /** Additional context */
  context?: Record<string, unknown>;
}

/**
 * Registry client error.
 */
export class RegistryError extends Error {
  /** Error kind */
  public readonly kind: RegistryErrorKind;
  /** HTTP status code */
  public readonly statusCode?: number;
  /** Retry-After value in seconds */
  public readonly retryAfter?: number;
  /** Raw response body, truncated */
  public readonly body?: string;
  /** Parsed registry error entries */
  public readonly registryErrors: RegistryErrorDetail[];
  /** Underlying cause */
  public override readonly cause?: unknown;
  /** Additional context */
  public readonly context: Record<string, unknown>;

  constructor(kind: RegistryErrorKind, message: string, options?: RegistryErrorOptions) {
    super(message);
    this.name = 'RegistryError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.retryAfter = options?.retryAfter;
    this.body = options?.body === undefined ? undefined : truncateBody(options.body);
    this.registryErrors = options?.registryErrors ?? [];
    this.cause = options?.cause;
    this.context = options?.context ?? {};

    // Maintains proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryError);
    }
  }

  /**
   * Whether a caller may retry the failed operation unchanged.
   */
  isTransient(): boolean {
    return (
      this.kind === RegistryErrorKind.Transient ||
      this.kind === RegistryErrorKind.TransportError ||
      this.kind === RegistryErrorKind.AuthServerError
    );
  }

  /**
   * Gets the retry delay in milliseconds.
   */
  getRetryDelay(): number | undefined {
    if (this.retryAfter !== undefined) {
      return this.retryAfter * 1000;
    }
    return undefined;
  }

  /**
   * Formats the error for logging.
   */
  override toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.retryAfter) {
      result += ` [retry after ${this.retryAfter}s]`;
    }
    return result;
  }

  /**
   * Converts to JSON for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      retryAfter: this.retryAfter,
      registryErrors: this.registryErrors,
      context: this.context,
    };
  }

  // Factory methods for common errors

  static malformedDigest(value: string, reason: string): RegistryError {
    return new RegistryError(
      RegistryErrorKind.MalformedDigest,
      `Malformed digest '${value}': ${reason}`,
      { context: { digest: value } }
    );
  }

  static invalidReference(message: string, value: string): RegistryError {
    return new RegistryError(RegistryErrorKind.InvalidReference, message, {
      context: { value },
    });
  }

  static malformedChallenge(header: string, reason: string): RegistryError {
    return new RegistryError(
      RegistryErrorKind.MalformedChallenge,
      `Malformed WWW-Authenticate challenge: ${reason}`,
      { context: { header } }
    );
  }

  static authServerError(
    realm: string,
    message: string,
    options?: { statusCode?: number; cause?: unknown; body?: string }
  ): RegistryError {
    return new RegistryError(
      RegistryErrorKind.AuthServerError,
      `Token request to ${realm} failed: ${message}`,
      { ...options, context: { realm } }
    );
  }

  static authenticationFailed(
    message: string,
    options?: { statusCode?: number; context?: Record<string, unknown>; body?: string }
  ): RegistryError {
    return new RegistryError(RegistryErrorKind.AuthenticationFailed, message, options);
  }

  static notFound(
    target: NotFoundTarget,
    context: Record<string, unknown>,
    registryErrors?: RegistryErrorDetail[]
  ): RegistryError {
    const subject = String(
      (target === 'repository' ? context.repository : context.reference ?? context.digest) ?? ''
    );
    const label = target.charAt(0).toUpperCase() + target.slice(1);
    return new RegistryError(
      NOT_FOUND_KINDS[target],
      subject ? `${label} not found: ${subject}` : `${label} not found`,
      { statusCode: 404, context, registryErrors }
    );
  }

  static digestMismatch(
    expected: string,
    actual: string,
    context?: Record<string, unknown>
  ): RegistryError {
    return new RegistryError(
      RegistryErrorKind.DigestMismatch,
      `Digest mismatch: expected ${expected}, got ${actual}`,
      { context: { ...context, expected, actual } }
    );
  }

  static truncatedBlob(
    digest: string,
    expectedBytes: number,
    receivedBytes: number
  ): RegistryError {
    return new RegistryError(
      RegistryErrorKind.TruncatedBlob,
      `Blob ${digest} ended after ${receivedBytes} of ${expectedBytes} bytes`,
      { context: { digest, expected: expectedBytes, actual: receivedBytes } }
    );
  }

  static sizeMismatch(
    digest: string,
    expectedBytes: number,
    receivedBytes: number
  ): RegistryError {
    return new RegistryError(
      RegistryErrorKind.SizeMismatch,
      `Blob ${digest} produced ${receivedBytes} bytes, expected ${expectedBytes}`,
      { context: { digest, expected: expectedBytes, actual: receivedBytes } }
    );
  }

  static unsupportedManifestType(
    mediaType: string,
    context?: Record<string, unknown>
  ): RegistryError {
    return new RegistryError(
      RegistryErrorKind.UnsupportedManifestType,
      `Unsupported manifest media type: ${mediaType || '(none)'}`,
      { context: { ...context, mediaType } }
    );
  }

  static invalidManifest(
    reason: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ): RegistryError {
    return new RegistryError(RegistryErrorKind.InvalidManifest, `Invalid manifest: ${reason}`, {
      context,
      cause,
    });
  }

  static invalidResponse(
    reason: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ): RegistryError {
    return new RegistryError(
      RegistryErrorKind.InvalidResponse,
      `Invalid registry response: ${reason}`,
      { context, cause }
    );
  }

  static rejected(
    status: number,
    body: string,
    registryErrors: RegistryErrorDetail[],
    context?: Record<string, unknown>
  ): RegistryError {
    const summary = registryErrors[0]?.message ?? registryErrors[0]?.code;
    return new RegistryError(
      RegistryErrorKind.RegistryRejected,
      summary ? `Registry rejected request: ${summary}` : `Registry rejected request`,
      { statusCode: status, body, registryErrors, context }
    );
  }

  static transient(
    status: number,
    retryAfter?: number,
    context?: Record<string, unknown>
  ): RegistryError {
    return new RegistryError(
      RegistryErrorKind.Transient,
      `Registry temporarily unavailable (HTTP ${status})`,
      { statusCode: status, retryAfter, context }
    );
  }

  static transport(message: string, cause?: unknown): RegistryError {
    return new RegistryError(RegistryErrorKind.TransportError, message, { cause });
  }

  static timeout(operation: string, timeoutMs: number): RegistryError {
    return new RegistryError(
      RegistryErrorKind.TransportError,
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      { context: { timeoutMs } }
    );
  }

  static invalidConfig(message: string): RegistryError {
    return new RegistryError(RegistryErrorKind.InvalidConfig, message);
  }

  static invalidState(message: string): RegistryError {
    return new RegistryError(RegistryErrorKind.InvalidState, message);
  }
}

function truncateBody(body: string): string {
  if (body.length <= MAX_ERROR_BODY_LENGTH) {
    return body;
  }
  return body.slice(0, MAX_ERROR_BODY_LENGTH);
}

/**
 * Parses a Retry-After header value given in seconds.
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    return undefined;
  }
  return parsed;
}

/**
 * Extracts the `errors` array of a registry error body. Bodies that are not
 * JSON, or not in that shape, yield an empty list.
 */
export function parseRegistryErrors(body: string): RegistryErrorDetail[] {
  if (!body) {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return [];
  }
  if (typeof parsed !== 'object' || parsed === null || !('errors' in parsed)) {
    return [];
  }
  const { errors } = parsed;
  if (!Array.isArray(errors)) {
    return [];
  }
  const entries: unknown[] = errors;
  const result: RegistryErrorDetail[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null || !('code' in entry)) {
      continue;
    }
    const { code } = entry;
    if (typeof code !== 'string') {
      continue;
    }
    const detail: RegistryErrorDetail = { code };
    if ('message' in entry && typeof entry.message === 'string') {
      detail.message = entry.message;
    }
    if ('detail' in entry) {
      detail.detail = entry.detail;
    }
    result.push(detail);
  }
  return result;
}

/**
 * Type guard for RegistryError.
 */
export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

/**
 * Checks whether an error is one of the not-found kinds.
 */
export function isNotFound(error: unknown): error is RegistryError {
  return (
    isRegistryError(error) &&
    (error.kind === RegistryErrorKind.ManifestNotFound ||
      error.kind === RegistryErrorKind.BlobNotFound ||
      error.kind === RegistryErrorKind.RepositoryNotFound)
  );
}

/**
 * Checks whether an error reports content that failed verification.
 */
export function isIntegrityError(error: unknown): error is RegistryError {
  return (
    isRegistryError(error) &&
    (error.kind === RegistryErrorKind.DigestMismatch ||
      error.kind === RegistryErrorKind.TruncatedBlob ||
      error.kind === RegistryErrorKind.SizeMismatch)
  );
}

/**
 * Checks whether an error may succeed when retried by the caller.
 */
export function isTransient(error: unknown): boolean {
  return isRegistryError(error) && error.isTransient();
}
