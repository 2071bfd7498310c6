/**
 * Item (product/service) resource helpers
 * Endpoint: /items
 */

import { ZohoBooksClient, WriteResult } from '../http/client';
import { ItemCreateRequest, ItemSchema, ZohoItem } from '../types';

export async function listItems(client: ZohoBooksClient): Promise<ZohoItem[]> {
  return client.listAll('/items', 'items', ItemSchema);
}

export async function createItem(
  client: ZohoBooksClient,
  request: ItemCreateRequest,
  placeholderKey?: string | number
): Promise<WriteResult> {
  return client.write({
    method: 'POST',
    path: '/items',
    body: request,
    entity: 'item',
    responseKey: 'item',
    idField: 'item_id',
    placeholderKey,
  });
}
