/**
 * Cursor-based paging over WAPI result sets.
 *
 * @module client/pagination
 */

import { z } from 'zod';
import { TransportError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { WapiRequest } from '../transport/index.js';
import { requirePositiveInt } from '../validation/index.js';
import type { CallExecutor } from './executor.js';

export const PAGING_PARAM = '_paging';
export const MAX_RESULTS_PARAM = '_max_results';
export const PAGE_ID_PARAM = '_page_id';

export interface PageOptions {
  /** Records requested per page. */
  pageSize: number;
  /** Stop with an error after this many pages when a cursor is still present. */
  maxPages?: number;
  logger?: Logger;
}

/**
 * Iterates through all pages of a paged GET, yielding each page's records.
 */
export async function* paginateAll<S extends z.ZodTypeAny>(
  executor: CallExecutor,
  call: WapiRequest,
  itemSchema: S,
  options: PageOptions
): AsyncGenerator<z.output<S>[], void, unknown> {
  requirePositiveInt(options.pageSize, 'Page size');
  const logger = options.logger ?? new NoopLogger();
  const pageSchema = z.array(itemSchema);

  const query: Record<string, string> = {
    ...call.query,
    [PAGING_PARAM]: '1',
    [MAX_RESULTS_PARAM]: String(options.pageSize),
  };

  let page = await executor.executeEnvelope({ ...call, query }, pageSchema);
  yield page.result;
  let fetched = 1;
  let cursor = page.next_page_id;

  while (cursor !== undefined) {
    if (options.maxPages !== undefined && fetched >= options.maxPages) {
      throw new TransportError(
        `Paged query on ${call.path} exceeded ${options.maxPages} pages`
      );
    }
    logger.info('Querying next page id', { pageId: cursor });
    page = await executor.executeEnvelope(
      { ...call, query: { ...query, [PAGE_ID_PARAM]: cursor } },
      pageSchema
    );
    yield page.result;
    fetched += 1;
    cursor = page.next_page_id;
  }
}

/**
 * Collects every page of a paged GET, in order.
 */
export async function getAllPages<S extends z.ZodTypeAny>(
  executor: CallExecutor,
  call: WapiRequest,
  itemSchema: S,
  options: PageOptions
): Promise<z.output<S>[]> {
  const allItems: z.output<S>[] = [];
  for await (const items of paginateAll(executor, call, itemSchema, options)) {
    allItems.push(...items);
  }
  return allItems;
}
