/**
 * Tests for Link-header pagination of tags and the catalog.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthNegotiator } from '../../auth/negotiator.js';
import { createConfig } from '../../config.js';
import { RegistryError, RegistryErrorKind } from '../../errors.js';
import { NoopLogger } from '../../observability/logging.js';
import { MockTransport } from '../../testing/mock-transport.js';
import { RequestPipeline } from '../../transport/pipeline.js';
import { createCatalogOps } from '../catalog.js';
import type { CatalogOps } from '../catalog.js';
import { PageCursor, collect, parseNextLink } from '../pagination.js';
import { createTagOps } from '../tags.js';
import type { TagOps } from '../tags.js';

const ENDPOINT = 'https://registry.example';
const TAGS = '/v2/team/app/tags/list';

function next(url: string): Record<string, string> {
  return { Link: `<${url}>; rel="next"` };
}

async function failure(promise: Promise<unknown>): Promise<RegistryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RegistryError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the call to fail');
}

describe('parseNextLink', () => {
  it('should find the next link', () => {
    expect(parseNextLink('</v2/_catalog?last=b&n=2>; rel="next"')).toBe('/v2/_catalog?last=b&n=2');
  });

  it('should accept unquoted and multi-valued rel', () => {
    expect(parseNextLink('<https://r.example/a>; rel=next')).toBe('https://r.example/a');
    expect(parseNextLink('<https://r.example/a>; type="x"; rel="prefetch next"')).toBe(
      'https://r.example/a'
    );
  });

  it('should skip other relations', () => {
    expect(parseNextLink('</first>; rel="first", </second>; rel="next"')).toBe('/second');
    expect(parseNextLink('</prev>; rel="prev"')).toBeUndefined();
  });
});

describe('PageCursor', () => {
  it('should resolve relative links against the endpoint', () => {
    const cursor = PageCursor.fromLinkHeader('</v2/_catalog?n=2&last=b>; rel="next"', ENDPOINT);
    expect(cursor?.href).toBe(`${ENDPOINT}/v2/_catalog?n=2&last=b`);
  });

  it('should return undefined without a header', () => {
    expect(PageCursor.fromLinkHeader(null, ENDPOINT)).toBeUndefined();
  });

  it('should refuse links to another origin', () => {
    expect(() =>
      PageCursor.fromLinkHeader('<https://elsewhere.example/v2/_catalog>; rel="next"', ENDPOINT)
    ).toThrow("Invalid registry response: Link target 'https://elsewhere.example/v2/_catalog' leaves the registry origin");
  });
});

describe('listings', () => {
  let transport: MockTransport;
  let tags: TagOps;
  let catalog: CatalogOps;

  beforeEach(() => {
    transport = new MockTransport();
    const config = createConfig({ endpoint: ENDPOINT, pageSize: 2 });
    const pipeline = new RequestPipeline({
      endpoint: config.endpoint,
      transport,
      negotiator: new AuthNegotiator({ transport }),
    });
    const context = { config, pipeline, logger: new NoopLogger() };
    tags = createTagOps(context);
    catalog = createCatalogOps(context);
  });

  describe('tags', () => {
    it('should follow links across pages, including an empty one', async () => {
      transport.on('GET', `${TAGS}?n=2`, {
        headers: next(`${TAGS}?n=2&last=b`),
        body: { name: 'team/app', tags: ['a', 'b'] },
      });
      transport.on('GET', `${TAGS}?n=2&last=b`, {
        headers: next(`${TAGS}?n=2&last=c`),
        body: { name: 'team/app', tags: [] },
      });
      transport.on('GET', `${TAGS}?n=2&last=c`, {
        body: { name: 'team/app', tags: ['d'] },
      });

      expect(await tags.all('team/app')).toEqual(['a', 'b', 'd']);
      expect(transport.requests).toHaveLength(3);
    });

    it('should expose pages', async () => {
      transport.on('GET', `${TAGS}?n=2`, {
        headers: next(`${TAGS}?n=2&last=b`),
        body: { tags: ['a', 'b'] },
      });
      transport.on('GET', `${TAGS}?n=2&last=b`, { body: { tags: ['c'] } });

      const pages = await collect(tags.pages('team/app'));

      expect(pages.map((page) => page.items)).toEqual([['a', 'b'], ['c']]);
      expect(pages[0].next?.href).toBe(`${ENDPOINT}${TAGS}?n=2&last=b`);
      expect(pages[1].next).toBeUndefined();
    });

    it('should end on a full page without a link', async () => {
      transport.on('GET', `${TAGS}?n=2`, { body: { tags: ['a', 'b'] } });

      expect(await tags.all('team/app')).toEqual(['a', 'b']);
      expect(transport.requests).toHaveLength(1);
    });

    it('should be lazy', async () => {
      transport.on('GET', `${TAGS}?n=2`, {
        headers: next(`${TAGS}?n=2&last=b`),
        body: { tags: ['a', 'b'] },
      });

      const iterator = tags.list('team/app');
      expect(transport.requests).toHaveLength(0);

      expect((await iterator.next()).value).toBe('a');
      await iterator.return(undefined);

      expect(transport.requests).toHaveLength(1);
    });

    it('should pass page size and start marker', async () => {
      transport.on('GET', `${TAGS}?n=5&last=v1`, { body: { tags: ['v2'] } });

      const page = await tags.page('team/app', { pageSize: 5, last: 'v1' });

      expect(page).toEqual({ items: ['v2'] });
    });

    it('should continue from a cursor', async () => {
      transport.on('GET', `${TAGS}?n=2`, {
        headers: next(`${TAGS}?n=2&last=b`),
        body: { tags: ['a', 'b'] },
      });
      transport.on('GET', `${TAGS}?n=2&last=b`, { body: { tags: ['c'] } });

      const first = await tags.page('team/app');
      const second = await tags.page('team/app', {}, first.next);

      expect(second.items).toEqual(['c']);
    });

    it('should treat null tags as an empty page', async () => {
      transport.on('GET', `${TAGS}?n=2`, { body: { name: 'team/app', tags: null } });

      expect(await tags.all('team/app')).toEqual([]);
    });

    it('should stop on a repeated link', async () => {
      transport.on('GET', `${TAGS}?n=2`, {
        headers: next(`${TAGS}?n=2&last=b`),
        body: { tags: ['a', 'b'] },
      });
      transport.on('GET', `${TAGS}?n=2&last=b`, {
        headers: next(`${TAGS}?n=2&last=b`),
        body: { tags: ['c'] },
      });

      const error = await failure(tags.all('team/app'));

      expect(error.kind).toBe(RegistryErrorKind.InvalidResponse);
      expect(transport.requests).toHaveLength(2);
    });

    it('should reject bodies that are not listings', async () => {
      transport.on('GET', `${TAGS}?n=2`, { body: { tags: 'a,b' } });

      const error = await failure(tags.all('team/app'));

      expect(error.kind).toBe(RegistryErrorKind.InvalidResponse);
    });

    it('should report a missing repository', async () => {
      transport.on('GET', `${TAGS}?n=2`, {
        status: 404,
        body: { errors: [{ code: 'NAME_UNKNOWN', message: 'repository name not known to registry' }] },
      });

      const error = await failure(tags.all('team/app'));

      expect(error.kind).toBe(RegistryErrorKind.RepositoryNotFound);
    });
  });

  describe('catalog', () => {
    it('should list every repository', async () => {
      transport.on('GET', '/v2/_catalog?n=2', {
        headers: next('/v2/_catalog?n=2&last=team%2Fb'),
        body: { repositories: ['team/a', 'team/b'] },
      });
      transport.on('GET', '/v2/_catalog?n=2&last=team%2Fb', { body: { repositories: ['team/c'] } });

      expect(await catalog.all()).toEqual(['team/a', 'team/b', 'team/c']);
    });

    it('should fetch one page with a start marker', async () => {
      transport.on('GET', '/v2/_catalog?n=10&last=team%2Fa', { body: { repositories: ['team/b'] } });

      const page = await catalog.page({ pageSize: 10, last: 'team/a' });

      expect(page.items).toEqual(['team/b']);
    });
  });
});
