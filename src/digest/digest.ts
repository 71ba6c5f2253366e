/**
 * Content digests in the `algorithm:hex` form used to address manifests and
 * blobs, and a streaming accumulator that computes them.
 *
 * @module digest/digest
 */

import { createHash, type Hash } from 'crypto';
import { RegistryError } from '../errors.js';

/**
 * Supported digest algorithms.
 */
export type DigestAlgorithm = 'sha256' | 'sha512';

/**
 * Hex lengths for each algorithm.
 */
const HEX_LENGTHS: Record<DigestAlgorithm, number> = {
  sha256: 64,
  sha512: 128,
};

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return value === 'sha256' || value === 'sha512';
}

/**
 * An immutable content digest.
 *
 * Parsing normalizes the hex part to lowercase, so two digests are equal
 * exactly when their canonical strings are equal.
 *
 * @example
 * ```typescript
 * const digest = Digest.parse('sha256:E3B0C442...');
 * digest.toString(); // 'sha256:e3b0c442...'
 * ```
 */
export class Digest {
  private constructor(
    public readonly algorithm: DigestAlgorithm,
    public readonly hex: string
  ) {}

  /**
   * Parses a digest from its wire form.
   *
   * @throws {RegistryError} MalformedDigest when the separator is missing, the
   * algorithm is not recognized, or the hex part has the wrong length or
   * characters.
   */
  static parse(value: string): Digest {
    const separator = value.indexOf(':');
    if (separator < 0) {
      throw RegistryError.malformedDigest(value, 'missing ":" separator');
    }

    const algorithm = value.slice(0, separator);
    const hex = value.slice(separator + 1);

    if (!isDigestAlgorithm(algorithm)) {
      throw RegistryError.malformedDigest(value, `unsupported algorithm '${algorithm}'`);
    }

    const expectedLength = HEX_LENGTHS[algorithm];
    if (hex.length !== expectedLength) {
      throw RegistryError.malformedDigest(
        value,
        `${algorithm} requires ${expectedLength} hex characters, got ${hex.length}`
      );
    }

    if (!HEX_PATTERN.test(hex)) {
      throw RegistryError.malformedDigest(value, 'digest value is not hexadecimal');
    }

    return new Digest(algorithm, hex.toLowerCase());
  }

  /**
   * Parses a digest, returning undefined instead of throwing.
   */
  static tryParse(value: string): Digest | undefined {
    try {
      return Digest.parse(value);
    } catch (error) {
      if (error instanceof RegistryError) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Checks whether a string is a well-formed digest.
   */
  static isValid(value: string): boolean {
    return Digest.tryParse(value) !== undefined;
  }

  /**
   * Computes the digest of a complete byte sequence.
   */
  static fromBytes(algorithm: DigestAlgorithm, bytes: Uint8Array | string): Digest {
    const accumulator = new DigestAccumulator(algorithm);
    accumulator.update(bytes);
    return accumulator.finalize();
  }

  /**
   * Computes the sha256 digest of a byte sequence.
   */
  static sha256(bytes: Uint8Array | string): Digest {
    return Digest.fromBytes('sha256', bytes);
  }

  /** @internal */
  static fromHash(algorithm: DigestAlgorithm, hex: string): Digest {
    return new Digest(algorithm, hex);
  }

  /**
   * Byte-exact equality on the canonical form.
   */
  equals(other: Digest): boolean {
    return this.algorithm === other.algorithm && this.hex === other.hex;
  }

  /**
   * Total order by canonical string.
   */
  compare(other: Digest): number {
    const a = this.toString();
    const b = other.toString();
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  /**
   * Creates an accumulator for this digest's algorithm.
   */
  accumulator(): DigestAccumulator {
    return new DigestAccumulator(this.algorithm);
  }

  toString(): string {
    return `${this.algorithm}:${this.hex}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Incremental digest computation.
 *
 * `finalize()` may be called once; further use throws InvalidState.
 */
export class DigestAccumulator {
  private readonly hash: Hash;
  private finalized = false;
  private count = 0;

  constructor(public readonly algorithm: DigestAlgorithm = 'sha256') {
    this.hash = createHash(algorithm);
  }

  /** Number of bytes consumed so far. */
  get bytesProcessed(): number {
    return this.count;
  }

  update(bytes: Uint8Array | string): this {
    if (this.finalized) {
      throw RegistryError.invalidState('Digest accumulator already finalized');
    }
    const chunk = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : bytes;
    this.hash.update(chunk);
    this.count += chunk.byteLength;
    return this;
  }

  finalize(): Digest {
    if (this.finalized) {
      throw RegistryError.invalidState('Digest accumulator already finalized');
    }
    this.finalized = true;
    return Digest.fromHash(this.algorithm, this.hash.digest('hex'));
  }
}
