/**
 * Repository catalog listing.
 * @module operations/catalog
 */

import { z } from 'zod';
import type { OperationContext } from './context.js';
import { collect, fetchPage, iterateItems, iteratePages } from './pagination.js';
import type { Page, PageCursor, PageOptions } from './pagination.js';

const catalogSchema = z.object({
  repositories: z.array(z.string()).nullable().optional(),
});

/**
 * Catalog operations interface.
 */
export interface CatalogOps {
  page(options?: PageOptions, cursor?: PageCursor): Promise<Page<string>>;
  pages(options?: PageOptions): AsyncGenerator<Page<string>, void, undefined>;
  /**
   * Lazily yields every repository name.
   */
  list(options?: PageOptions): AsyncGenerator<string, void, undefined>;
  all(options?: PageOptions): Promise<string[]>;
}

/**
 * Creates catalog operations.
 */
export function createCatalogOps(context: OperationContext): CatalogOps {
  return new CatalogOpsImpl(context);
}

class CatalogOpsImpl implements CatalogOps {
  constructor(private readonly context: OperationContext) {}

  async page(options: PageOptions = {}, cursor?: PageCursor): Promise<Page<string>> {
    return fetchPage(
      this.context.pipeline,
      {
        operation: { kind: 'catalog' },
        method: 'GET',
        path: '/v2/_catalog',
        query: {
          n: options.pageSize ?? this.context.config.pageSize,
          last: options.last,
        },
        headers: { Accept: 'application/json' },
        signal: options.signal,
      },
      catalogSchema,
      (document) => document.repositories ?? [],
      cursor
    );
  }

  pages(options: PageOptions = {}): AsyncGenerator<Page<string>, void, undefined> {
    return iteratePages((cursor) => this.page(options, cursor));
  }

  list(options: PageOptions = {}): AsyncGenerator<string, void, undefined> {
    return iterateItems(this.pages(options));
  }

  async all(options: PageOptions = {}): Promise<string[]> {
    return collect(this.list(options));
  }
}
