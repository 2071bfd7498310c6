import { z } from 'zod';
import { ResponseFormatError } from '../errors';
import { createLogger } from '../logging';
import { FreshBooksClient, SourceQuery } from './http/client';
import { ListResultSchema } from './types';

const log = createLogger('freshbooks');

export const SOURCE_PAGE_SIZE = 100;

/**
 * A paginated FreshBooks listing
 */
export interface SourceResource<T> {
  /** Path under /accounting/account/{account_id}/ */
  path: string;
  /** Key of the record array inside response.result */
  key: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  query?: SourceQuery;
}

/**
 * Fetch every page of a listing into one array.
 *
 * Pages are requested in order at a fixed page size until the page number
 * reaches the page count the server reports. No liveness filtering.
 */
export async function fetchAll<T>(
  client: FreshBooksClient,
  resource: SourceResource<T>,
  pageSize: number = SOURCE_PAGE_SIZE
): Promise<T[]> {
  const path = client.accountingPath(resource.path);
  const records: T[] = [];
  let page = 1;

  while (true) {
    const body = await client.get(path, { ...resource.query, page, per_page: pageSize });

    const envelope = ListResultSchema.safeParse(body);
    if (!envelope.success) {
      throw new ResponseFormatError(path, ['response is not a FreshBooks listing']);
    }
    const result = envelope.data.response.result;

    const items = z.array(resource.schema).safeParse(result[resource.key] ?? []);
    if (!items.success) {
      throw new ResponseFormatError(
        path,
        items.error.issues.map(issue => `${resource.key}.${issue.path.join('.')}: ${issue.message}`)
      );
    }
    records.push(...items.data);

    log.debug('Fetched page', { path, page, pages: result.pages, count: items.data.length });

    if (page >= result.pages) {
      return records;
    }
    page += 1;
  }
}
