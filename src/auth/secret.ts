/**
 * Secret string wrapper to prevent accidental exposure.
 * @module auth/secret
 */

/**
 * Secret string wrapper that prevents accidental logging or serialization.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  get length(): number {
    return this.value.length;
  }

  isEmpty(): boolean {
    return this.value.length === 0;
  }

  /**
   * Compares two secrets without exposing either.
   */
  equals(other: SecretString): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return 'SecretString(***)';
  }
}
