/**
 * Manifest media types, parsed manifest variants and their zod schemas.
 * @module types/manifest
 */

import { z } from 'zod';
import { Digest } from '../digest/digest.js';

/**
 * Media type constants for Docker and OCI manifests.
 */
export const MediaType = {
  // Docker schema 1
  DockerManifestV1Signed: 'application/vnd.docker.distribution.manifest.v1+prettyjws',
  DockerManifestV1: 'application/vnd.docker.distribution.manifest.v1+json',

  // Docker schema 2
  DockerManifestV2: 'application/vnd.docker.distribution.manifest.v2+json',
  DockerManifestList: 'application/vnd.docker.distribution.manifest.list.v2+json',
  DockerConfig: 'application/vnd.docker.container.image.v1+json',
  DockerLayer: 'application/vnd.docker.image.rootfs.diff.tar.gzip',

  // OCI
  OciManifest: 'application/vnd.oci.image.manifest.v1+json',
  OciIndex: 'application/vnd.oci.image.index.v1+json',
  OciConfig: 'application/vnd.oci.image.config.v1+json',
  OciLayer: 'application/vnd.oci.image.layer.v1.tar+gzip',
} as const;

/**
 * Media types offered in the Accept header of manifest requests, in order.
 */
export const DEFAULT_MANIFEST_MEDIA_TYPES: readonly string[] = [
  MediaType.DockerManifestV1Signed,
  MediaType.DockerManifestV1,
  MediaType.DockerManifestV2,
  MediaType.DockerManifestList,
  MediaType.OciManifest,
  MediaType.OciIndex,
];

/**
 * Manifest variant tag.
 */
export type ManifestKind = 'schema1' | 'schema2' | 'list';

const KIND_BY_MEDIA_TYPE: Record<string, ManifestKind> = {
  [MediaType.DockerManifestV1Signed]: 'schema1',
  [MediaType.DockerManifestV1]: 'schema1',
  [MediaType.DockerManifestV2]: 'schema2',
  [MediaType.OciManifest]: 'schema2',
  [MediaType.DockerManifestList]: 'list',
  [MediaType.OciIndex]: 'list',
};

/**
 * Maps a manifest media type to its variant, or undefined when unknown.
 */
export function manifestKindOf(mediaType: string): ManifestKind | undefined {
  return Object.prototype.hasOwnProperty.call(KIND_BY_MEDIA_TYPE, mediaType)
    ? KIND_BY_MEDIA_TYPE[mediaType]
    : undefined;
}

/**
 * Checks if a media type is a manifest list/index type.
 */
export function isIndexMediaType(mediaType: string): boolean {
  return manifestKindOf(mediaType) === 'list';
}

/**
 * Builds the Accept header value for manifest requests.
 */
export function manifestAcceptHeader(mediaTypes: readonly string[]): string {
  return mediaTypes.join(', ');
}

/**
 * Platform of a manifest list entry.
 */
export interface Platform {
  /** CPU architecture (amd64, arm64, etc.) */
  readonly architecture: string;
  /** Operating system (linux, windows, etc.) */
  readonly os: string;
  readonly 'os.version'?: string;
  readonly 'os.features'?: readonly string[];
  /** Architecture variant (e.g. v8 for arm64) */
  readonly variant?: string;
}

/**
 * Platform utility functions.
 */
export const Platform = {
  create(os: string, architecture: string, variant?: string): Platform {
    return variant ? { os, architecture, variant } : { os, architecture };
  },

  /**
   * Parses `os/arch[/variant]`.
   */
  parse(value: string): Platform | undefined {
    const parts = value.split('/');
    if (parts.length < 2 || parts.length > 3 || parts.some((p) => p.length === 0)) {
      return undefined;
    }
    const [os, architecture, variant] = parts;
    return Platform.create(os, architecture, variant);
  },

  /**
   * Checks whether `candidate` satisfies `wanted`. A wanted platform without
   * a variant matches any variant.
   */
  matches(wanted: Platform, candidate: Platform): boolean {
    if (wanted.os !== candidate.os || wanted.architecture !== candidate.architecture) {
      return false;
    }
    return wanted.variant === undefined || wanted.variant === candidate.variant;
  },

  toString(p: Platform): string {
    let result = `${p.os}/${p.architecture}`;
    if (p.variant) {
      result += `/${p.variant}`;
    }
    return result;
  },
};

/**
 * Content descriptor for configs and layers.
 */
export interface Descriptor {
  readonly mediaType: string;
  readonly digest: Digest;
  readonly size: number;
  readonly urls?: readonly string[];
  readonly annotations?: Readonly<Record<string, string>>;
}

/**
 * Docker image manifest schema 1, signed or not.
 */
export interface SchemaV1Manifest {
  readonly kind: 'schema1';
  readonly name: string;
  readonly tag: string;
  readonly architecture: string;
  /** Layer digests, base layer first */
  readonly layers: readonly Digest[];
  /** Whether the body carried JWS signatures */
  readonly signed: boolean;
}

/**
 * Docker schema 2 or OCI image manifest.
 */
export interface SchemaV2Manifest {
  readonly kind: 'schema2';
  readonly config: Descriptor;
  /** Layer descriptors, base layer first */
  readonly layers: readonly Descriptor[];
  readonly annotations?: Readonly<Record<string, string>>;
}

/**
 * Entry of a manifest list or OCI index.
 */
export interface ManifestListEntry {
  readonly mediaType: string;
  readonly digest: Digest;
  readonly size: number;
  readonly platform?: Platform;
  readonly annotations?: Readonly<Record<string, string>>;
}

/**
 * Docker manifest list or OCI image index.
 */
export interface ManifestList {
  readonly kind: 'list';
  readonly manifests: readonly ManifestListEntry[];
  readonly annotations?: Readonly<Record<string, string>>;
}

/**
 * Closed union of parsed manifests, selected by media type.
 */
export type Manifest = SchemaV1Manifest | SchemaV2Manifest | ManifestList;

/**
 * A fetched, verified manifest.
 */
export interface ManifestDescriptor {
  /** Media type declared by the registry (or resolved from the body) */
  readonly mediaType: string;
  /** Digest computed from the body */
  readonly digest: Digest;
  /** Raw body bytes as received */
  readonly body: Uint8Array;
  readonly manifest: Manifest;
}

/**
 * Layer digests of an image manifest, base layer first. Lists have none.
 */
export function layerDigests(manifest: Manifest): Digest[] {
  switch (manifest.kind) {
    case 'schema1':
      return [...manifest.layers];
    case 'schema2':
      return manifest.layers.map((layer) => layer.digest);
    case 'list':
      return [];
  }
}

/**
 * Config digest of a schema 2 manifest.
 */
export function configDigest(manifest: Manifest): Digest | undefined {
  return manifest.kind === 'schema2' ? manifest.config.digest : undefined;
}

// ============================================================================
// Body schemas
// ============================================================================

const digestSchema = z.string().transform((value, ctx) => {
  const digest = Digest.tryParse(value);
  if (!digest) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed digest '${value}'` });
    return z.NEVER;
  }
  return digest;
});

const annotationsSchema = z.record(z.string()).optional();

const descriptorSchema = z.object({
  mediaType: z.string(),
  digest: digestSchema,
  size: z.number().int().nonnegative(),
  urls: z.array(z.string()).optional(),
  annotations: annotationsSchema,
});

const platformSchema = z
  .object({
    architecture: z.string(),
    os: z.string(),
    'os.version': z.string().optional(),
    'os.features': z.array(z.string()).optional(),
    variant: z.string().optional(),
  })
  .passthrough();

const schema1BodySchema = z.object({
  schemaVersion: z.literal(1),
  name: z.string(),
  tag: z.string(),
  architecture: z.string(),
  fsLayers: z.array(z.object({ blobSum: digestSchema })),
  signatures: z.array(z.unknown()).optional(),
});

const schema2BodySchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  config: descriptorSchema,
  layers: z.array(descriptorSchema),
  annotations: annotationsSchema,
});

const listBodySchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  manifests: z.array(
    z.object({
      mediaType: z.string(),
      digest: digestSchema,
      size: z.number().int().nonnegative(),
      platform: platformSchema.optional(),
      annotations: annotationsSchema,
    })
  ),
  annotations: annotationsSchema,
});

/**
 * Fields used to pick a media type when the response declares none.
 */
const documentHintSchema = z.object({
  schemaVersion: z.number().optional(),
  mediaType: z.string().optional(),
  signatures: z.array(z.unknown()).optional(),
});

/**
 * Result of parsing a manifest document.
 */
export type ManifestParseResult =
  | { readonly success: true; readonly manifest: Manifest }
  | { readonly success: false; readonly reason: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * Parses a JSON document as the given manifest variant.
 */
export function parseManifestDocument(kind: ManifestKind, document: unknown): ManifestParseResult {
  switch (kind) {
    case 'schema1': {
      const result = schema1BodySchema.safeParse(document);
      if (!result.success) {
        return { success: false, reason: formatIssues(result.error) };
      }
      const body = result.data;
      return {
        success: true,
        manifest: {
          kind: 'schema1',
          name: body.name,
          tag: body.tag,
          architecture: body.architecture,
          // fsLayers lists the top layer first
          layers: body.fsLayers.map((layer) => layer.blobSum).reverse(),
          signed: (body.signatures?.length ?? 0) > 0,
        },
      };
    }
    case 'schema2': {
      const result = schema2BodySchema.safeParse(document);
      if (!result.success) {
        return { success: false, reason: formatIssues(result.error) };
      }
      const body = result.data;
      return {
        success: true,
        manifest: {
          kind: 'schema2',
          config: body.config,
          layers: body.layers,
          annotations: body.annotations,
        },
      };
    }
    case 'list': {
      const result = listBodySchema.safeParse(document);
      if (!result.success) {
        return { success: false, reason: formatIssues(result.error) };
      }
      const body = result.data;
      return {
        success: true,
        manifest: {
          kind: 'list',
          manifests: body.manifests,
          annotations: body.annotations,
        },
      };
    }
  }
}

/**
 * Picks a media type from the document itself, for responses that declare
 * none or only a generic JSON type.
 */
export function mediaTypeFromDocument(document: unknown): string | undefined {
  const result = documentHintSchema.safeParse(document);
  if (!result.success) {
    return undefined;
  }
  const { mediaType, schemaVersion, signatures } = result.data;
  if (mediaType) {
    return mediaType;
  }
  if (schemaVersion === 1) {
    return signatures && signatures.length > 0
      ? MediaType.DockerManifestV1Signed
      : MediaType.DockerManifestV1;
  }
  return undefined;
}
