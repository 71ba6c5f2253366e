/**
 * Repository names and manifest references.
 * @module types/reference
 */

import { Digest } from '../digest/digest.js';
import { RegistryError } from '../errors.js';

/**
 * Pattern for one path component of a repository name.
 */
const PATH_COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

/**
 * Pattern for tags.
 */
const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

/**
 * Maximum repository name length.
 */
export const MAX_REPOSITORY_LENGTH = 255;

/**
 * A manifest reference: a tag or a digest.
 */
export type Reference =
  | { readonly kind: 'tag'; readonly tag: string }
  | { readonly kind: 'digest'; readonly digest: Digest };

/**
 * Reference utility functions.
 */
export const Reference = {
  tag(tag: string): Reference {
    validateTag(tag);
    return { kind: 'tag', tag };
  },

  digest(digest: Digest): Reference {
    return { kind: 'digest', digest };
  },

  /**
   * Parses a reference: anything containing `:` must be a digest, anything
   * else a tag.
   *
   * @throws {RegistryError} MalformedDigest or InvalidReference
   */
  parse(value: string | Digest): Reference {
    if (value instanceof Digest) {
      return { kind: 'digest', digest: value };
    }
    if (value.includes(':')) {
      return { kind: 'digest', digest: Digest.parse(value) };
    }
    return Reference.tag(value);
  },

  toString(reference: Reference): string {
    return reference.kind === 'tag' ? reference.tag : reference.digest.toString();
  },
};

/**
 * Validates a repository name such as `library/alpine`.
 *
 * @throws {RegistryError} InvalidReference
 */
export function validateRepository(name: string): void {
  if (!name) {
    throw RegistryError.invalidReference('Repository name cannot be empty', name);
  }
  if (name.length > MAX_REPOSITORY_LENGTH) {
    throw RegistryError.invalidReference(
      `Repository name exceeds ${MAX_REPOSITORY_LENGTH} characters`,
      name
    );
  }
  for (const component of name.split('/')) {
    if (!PATH_COMPONENT.test(component)) {
      throw RegistryError.invalidReference(
        `Invalid repository name '${name}': component '${component}' must be lowercase alphanumerics separated by '.', '_', '__' or '-'`,
        name
      );
    }
  }
}

/**
 * Validates a tag.
 *
 * @throws {RegistryError} InvalidReference
 */
export function validateTag(tag: string): void {
  if (!TAG_PATTERN.test(tag)) {
    throw RegistryError.invalidReference(
      `Invalid tag '${tag}': must match [A-Za-z0-9_][A-Za-z0-9_.-]{0,127}`,
      tag
    );
  }
}
