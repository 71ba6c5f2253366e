/**
 * Tag listing.
 * @module operations/tags
 */

import { z } from 'zod';
import { validateRepository } from '../types/reference.js';
import type { OperationContext } from './context.js';
import { collect, fetchPage, iterateItems, iteratePages } from './pagination.js';
import type { Page, PageCursor, PageOptions } from './pagination.js';

const tagListSchema = z.object({
  name: z.string().optional(),
  // Some registries send null for a repository without tags
  tags: z.array(z.string()).nullable().optional(),
});

/**
 * Tag operations interface.
 */
export interface TagOps {
  /**
   * Fetches one page of tags; the first one, or the one `cursor` points at.
   */
  page(repository: string, options?: PageOptions, cursor?: PageCursor): Promise<Page<string>>;

  /**
   * Lazily walks every page of tags.
   */
  pages(repository: string, options?: PageOptions): AsyncGenerator<Page<string>, void, undefined>;

  /**
   * Lazily yields every tag, in registry order.
   */
  list(repository: string, options?: PageOptions): AsyncGenerator<string, void, undefined>;

  /**
   * Collects every tag.
   */
  all(repository: string, options?: PageOptions): Promise<string[]>;
}

/**
 * Creates tag operations.
 */
export function createTagOps(context: OperationContext): TagOps {
  return new TagOpsImpl(context);
}

/**
 * Tag operations implementation.
 */
class TagOpsImpl implements TagOps {
  constructor(private readonly context: OperationContext) {}

  async page(
    repository: string,
    options: PageOptions = {},
    cursor?: PageCursor
  ): Promise<Page<string>> {
    validateRepository(repository);
    return fetchPage(
      this.context.pipeline,
      {
        operation: { kind: 'tags', repository },
        method: 'GET',
        path: `/v2/${repository}/tags/list`,
        query: {
          n: options.pageSize ?? this.context.config.pageSize,
          last: options.last,
        },
        headers: { Accept: 'application/json' },
        signal: options.signal,
      },
      tagListSchema,
      (document) => document.tags ?? [],
      cursor
    );
  }

  pages(repository: string, options: PageOptions = {}): AsyncGenerator<Page<string>, void, undefined> {
    validateRepository(repository);
    return iteratePages((cursor) => this.page(repository, options, cursor));
  }

  list(repository: string, options: PageOptions = {}): AsyncGenerator<string, void, undefined> {
    return iterateItems(this.pages(repository, options));
  }

  async all(repository: string, options: PageOptions = {}): Promise<string[]> {
    return collect(this.list(repository, options));
  }
}
