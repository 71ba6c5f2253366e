/**
 * `WWW-Authenticate` challenge parsing.
 *
 * Registries answer unauthenticated requests with one of
 *
 * ```
 * WWW-Authenticate: Bearer realm="https://auth.example/token",service="registry",scope="repository:foo:pull"
 * WWW-Authenticate: Basic realm="Registry Realm"
 * ```
 *
 * Parsing fails closed: a header that is present but cannot be understood is
 * a MalformedChallenge, never a reason to continue unauthenticated.
 *
 * @module auth/challenge
 */

import { RegistryError } from '../errors.js';

/**
 * A challenge the client can answer.
 */
export type AuthChallenge =
  | {
      readonly scheme: 'basic';
      readonly realm?: string;
    }
  | {
      readonly scheme: 'bearer';
      readonly realm: string;
      readonly service?: string;
      readonly scope?: string;
      /** Error code sent with the challenge, e.g. `insufficient_scope` */
      readonly error?: string;
    };

/**
 * A challenge as it appears on the wire: lowercased scheme and parameters.
 */
export interface RawChallenge {
  readonly scheme: string;
  readonly params: Readonly<Record<string, string>>;
}

const TOKEN_CHAR = /[!#$%&'*+\-.^_`|~0-9A-Za-z]/;

/**
 * Splits a header into its challenges.
 *
 * @throws {RegistryError} MalformedChallenge on unterminated quotes, missing
 * values, duplicate parameters or stray characters
 */
export function parseChallenges(header: string): RawChallenge[] {
  const input = header;
  const length = input.length;
  const challenges: RawChallenge[] = [];
  let pos = 0;

  const fail = (reason: string): never => {
    throw RegistryError.malformedChallenge(header, reason);
  };

  const isSpace = (c: string | undefined): boolean => c === ' ' || c === '\t';

  const skipSpaces = (): void => {
    while (pos < length && isSpace(input[pos])) pos++;
  };

  const skipSeparators = (): void => {
    while (pos < length && (isSpace(input[pos]) || input[pos] === ',')) pos++;
  };

  const readToken = (): string => {
    const start = pos;
    while (pos < length && TOKEN_CHAR.test(input[pos])) pos++;
    return input.slice(start, pos);
  };

  const readQuoted = (): string => {
    // opening quote
    pos++;
    let out = '';
    while (pos < length) {
      const c = input[pos];
      if (c === '\\') {
        if (pos + 1 >= length) {
          return fail('unterminated escape in quoted string');
        }
        out += input[pos + 1];
        pos += 2;
        continue;
      }
      if (c === '"') {
        pos++;
        return out;
      }
      out += c;
      pos++;
    }
    return fail('unterminated quoted string');
  };

  for (;;) {
    skipSeparators();
    if (pos >= length) {
      break;
    }

    const scheme = readToken();
    if (!scheme) {
      fail(`unexpected character '${input[pos]}' at offset ${pos}`);
    }

    const params: Record<string, string> = {};
    skipSpaces();

    while (pos < length) {
      const start = pos;
      const name = readToken();
      skipSpaces();
      if (!name || input[pos] !== '=') {
        // Start of the next challenge
        pos = start;
        break;
      }
      pos++;
      skipSpaces();

      let value: string;
      if (input[pos] === '"') {
        value = readQuoted();
      } else {
        value = readToken();
        if (!value) {
          fail(`missing value for parameter '${name}'`);
        }
      }

      const key = name.toLowerCase();
      if (Object.prototype.hasOwnProperty.call(params, key)) {
        fail(`duplicate parameter '${key}'`);
      }
      params[key] = value;

      skipSpaces();
      if (pos >= length) {
        break;
      }
      if (input[pos] !== ',') {
        fail(`expected ',' after parameter '${name}'`);
      }
      skipSeparators();
    }

    challenges.push({ scheme: scheme.toLowerCase(), params });
  }

  return challenges;
}

/**
 * Parses a `WWW-Authenticate` header into the challenge to answer.
 *
 * Bearer is preferred over Basic when a header offers both.
 *
 * @throws {RegistryError} MalformedChallenge when the header is empty,
 * unparsable, offers no supported scheme, or a Bearer challenge lacks an
 * absolute http(s) realm
 */
export function parseChallenge(header: string): AuthChallenge {
  const challenges = parseChallenges(header);
  if (challenges.length === 0) {
    throw RegistryError.malformedChallenge(header, 'empty header');
  }

  const bearer = challenges.find((c) => c.scheme === 'bearer');
  if (bearer) {
    const { realm, service, scope, error } = bearer.params;
    if (!realm) {
      throw RegistryError.malformedChallenge(header, 'Bearer challenge without realm');
    }
    if (!isHttpUrl(realm)) {
      throw RegistryError.malformedChallenge(header, `realm '${realm}' is not an http(s) URL`);
    }
    return {
      scheme: 'bearer',
      realm,
      ...(service !== undefined && { service }),
      ...(scope !== undefined && { scope }),
      ...(error !== undefined && { error }),
    };
  }

  const basic = challenges.find((c) => c.scheme === 'basic');
  if (basic) {
    const { realm } = basic.params;
    return realm !== undefined ? { scheme: 'basic', realm } : { scheme: 'basic' };
  }

  const schemes = challenges.map((c) => c.scheme).join(', ');
  throw RegistryError.malformedChallenge(header, `no supported scheme in '${schemes}'`);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

/**
 * Cache key of a credential: the `(realm, service, scope)` triple.
 */
export function challengeKey(challenge: AuthChallenge): string {
  if (challenge.scheme === 'basic') {
    return `basic|${challenge.realm ?? ''}`;
  }
  return `bearer|${challenge.realm}|${challenge.service ?? ''}|${challenge.scope ?? ''}`;
}
