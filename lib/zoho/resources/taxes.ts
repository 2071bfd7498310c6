/**
 * Tax resource helpers
 * Endpoint: /settings/taxes
 */

import { ZohoBooksClient, WriteResult } from '../http/client';
import { TaxCreateRequest, TaxSchema, ZohoTax } from '../types';

export async function listTaxes(client: ZohoBooksClient): Promise<ZohoTax[]> {
  return client.listAll('/settings/taxes', 'taxes', TaxSchema);
}

export async function createTax(
  client: ZohoBooksClient,
  request: TaxCreateRequest,
  placeholderKey?: string | number
): Promise<WriteResult> {
  return client.write({
    method: 'POST',
    path: '/settings/taxes',
    body: request,
    entity: 'tax',
    responseKey: 'tax',
    idField: 'tax_id',
    placeholderKey,
  });
}
