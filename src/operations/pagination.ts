/**
 * Link-header pagination for tag and catalog listings.
 *
 * A listing response continues when it carries `Link: <url>; rel="next"`;
 * it ends when no such link is present, whatever the size of the page.
 *
 * @module operations/pagination
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { RegistryError } from '../errors.js';
import { readBody } from '../transport/http.js';
import type { PipelineRequest, RequestPipeline } from '../transport/pipeline.js';
import type { CallOptions } from './context.js';

/**
 * Largest listing page read, in bytes.
 */
const MAX_PAGE_BYTES = 16 * 1024 * 1024;

/**
 * Continuation of a listing. Opaque: it only produces the next request.
 */
export class PageCursor {
  private constructor(private readonly url: string) {}

  /**
   * Extracts the `rel="next"` target of a Link header, resolved against
   * `endpoint`. Returns undefined when there is none.
   *
   * @throws {RegistryError} InvalidResponse when the target is not a URL
   * or points at another origin
   */
  static fromLinkHeader(header: string | null, endpoint: string): PageCursor | undefined {
    if (!header) {
      return undefined;
    }
    const target = parseNextLink(header);
    if (target === undefined) {
      return undefined;
    }

    let url: URL;
    try {
      url = new URL(target, endpoint);
    } catch (error) {
      throw RegistryError.invalidResponse(`Link target '${target}' is not a URL`, undefined, error);
    }
    if (url.origin !== new URL(endpoint).origin) {
      throw RegistryError.invalidResponse(`Link target '${target}' leaves the registry origin`);
    }
    return new PageCursor(url.toString());
  }

  /** @internal */
  get href(): string {
    return this.url;
  }

  equals(other: PageCursor): boolean {
    return this.url === other.url;
  }
}

/**
 * Finds the `rel="next"` URL reference in a Link header.
 */
export function parseNextLink(header: string): string | undefined {
  const linkPattern = /<([^>]*)>((?:\s*;\s*[^;,]*)*)/g;
  let match: RegExpExecArray | null;
  while ((match = linkPattern.exec(header)) !== null) {
    const [, target, params] = match;
    for (const param of params.split(';')) {
      const eq = param.indexOf('=');
      if (eq < 0) {
        continue;
      }
      const name = param.slice(0, eq).trim().toLowerCase();
      const value = param
        .slice(eq + 1)
        .trim()
        .replace(/^"(.*)"$/, '$1');
      if (name === 'rel' && value.toLowerCase().split(/\s+/).includes('next')) {
        return target;
      }
    }
  }
  return undefined;
}

/**
 * A listing result.
 */
export interface Page<T> {
  readonly items: readonly T[];
  /** Present when the registry announced another page */
  readonly next?: PageCursor;
}

/**
 * Options for one listing page.
 */
export interface PageOptions extends CallOptions {
  /** Requested page size (`n`) */
  readonly pageSize?: number;
  /** Start after this entry (`last`) */
  readonly last?: string;
}

/**
 * Fetches one listing page: the first one built from `request` and
 * `options`, or the one `cursor` points at.
 */
export async function fetchPage<T, D>(
  pipeline: RequestPipeline,
  request: PipelineRequest,
  schema: ZodType<D, ZodTypeDef, unknown>,
  extract: (document: D) => readonly T[],
  cursor?: PageCursor
): Promise<Page<T>> {
  const response = await pipeline.execute(
    cursor ? { ...request, url: cursor.href, query: undefined } : request
  );

  const body = await readBody(response, MAX_PAGE_BYTES);
  let document: unknown;
  try {
    document = JSON.parse(Buffer.from(body).toString('utf8'));
  } catch (error) {
    throw RegistryError.invalidResponse('listing body is not JSON', undefined, error);
  }

  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    throw RegistryError.invalidResponse(
      `unexpected listing body: ${parsed.error.issues.map((i) => i.message).join(', ')}`
    );
  }

  const next = PageCursor.fromLinkHeader(response.headers.get('link'), pipeline.endpoint);
  const items = extract(parsed.data);
  return next ? { items, next } : { items };
}

/**
 * Walks pages lazily from the first one until a page has no next link.
 * Empty pages with a link are followed.
 *
 * @throws {RegistryError} InvalidResponse when a next link repeats one
 * already followed
 */
export async function* iteratePages<T>(
  fetchOne: (cursor?: PageCursor) => Promise<Page<T>>
): AsyncGenerator<Page<T>, void, undefined> {
  const followed = new Set<string>();
  let cursor: PageCursor | undefined;
  do {
    const page = await fetchOne(cursor);
    yield page;
    cursor = page.next;
    if (cursor) {
      if (followed.has(cursor.href)) {
        throw RegistryError.invalidResponse('pagination link repeats an earlier page');
      }
      followed.add(cursor.href);
    }
  } while (cursor);
}

/**
 * Flattens pages into their items.
 */
export async function* iterateItems<T>(
  pages: AsyncIterable<Page<T>>
): AsyncGenerator<T, void, undefined> {
  for await (const page of pages) {
    yield* page.items;
  }
}

/**
 * Collects every item of a lazy sequence.
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
