/**
 * Signing payload of schema 1 signed manifests.
 *
 * A `prettyjws` manifest embeds its JWS signatures in the body, so the
 * content digest covers the body without them. Each signature's protected
 * header says how to rebuild that payload: keep the first `formatLength`
 * bytes of the body and append the base64url-decoded `formatTail`.
 *
 * @module digest/jws
 */

import { z } from 'zod';
import { RegistryError } from '../errors.js';

const signaturesSchema = z.object({
  signatures: z.array(z.object({ protected: z.string().optional() }).passthrough()),
});

const protectedHeaderSchema = z.object({
  formatLength: z.number().int().nonnegative(),
  formatTail: z.string(),
});

/**
 * Rebuilds the signed payload of a schema 1 manifest.
 *
 * Returns undefined when the document carries no protected headers.
 *
 * @throws {RegistryError} InvalidManifest when a protected header cannot be
 * decoded or signatures disagree on the payload bounds
 */
export function extractJwsPayload(body: Uint8Array, document: unknown): Uint8Array | undefined {
  const parsed = signaturesSchema.safeParse(document);
  if (!parsed.success) {
    return undefined;
  }

  let formatLength: number | undefined;
  let formatTail: Buffer | undefined;

  for (const [index, signature] of parsed.data.signatures.entries()) {
    if (signature.protected === undefined) {
      continue;
    }
    const header = decodeProtectedHeader(signature.protected, index);

    if (formatLength === undefined) {
      formatLength = header.formatLength;
    } else if (formatLength !== header.formatLength) {
      throw RegistryError.invalidManifest(
        `conflicting formatLength in signatures[${index}].protected`
      );
    }

    const tail = Buffer.from(header.formatTail, 'base64url');
    if (formatTail === undefined) {
      formatTail = tail;
    } else if (!formatTail.equals(tail)) {
      throw RegistryError.invalidManifest(`conflicting formatTail in signatures[${index}].protected`);
    }
  }

  if (formatLength === undefined || formatTail === undefined) {
    return undefined;
  }
  if (formatLength > body.byteLength) {
    throw RegistryError.invalidManifest(
      `formatLength ${formatLength} exceeds body length ${body.byteLength}`
    );
  }

  return Buffer.concat([body.subarray(0, formatLength), formatTail]);
}

function decodeProtectedHeader(
  value: string,
  index: number
): z.infer<typeof protectedHeaderSchema> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(value, 'base64url').toString('utf8'));
  } catch (error) {
    throw RegistryError.invalidManifest(
      `signatures[${index}].protected is not base64url JSON`,
      undefined,
      error
    );
  }
  const header = protectedHeaderSchema.safeParse(decoded);
  if (!header.success) {
    throw RegistryError.invalidManifest(
      `signatures[${index}].protected lacks formatLength or formatTail`
    );
  }
  return header.data;
}
