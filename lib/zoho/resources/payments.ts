/**
 * Customer payment resource helpers
 * Endpoint: /customerpayments
 */

import { ZohoBooksClient, WriteResult } from '../http/client';
import { PaymentCreateRequest, PaymentSchema, ZohoPayment } from '../types';

export async function listPayments(client: ZohoBooksClient): Promise<ZohoPayment[]> {
  return client.listAll('/customerpayments', 'customerpayments', PaymentSchema);
}

export async function createPayment(
  client: ZohoBooksClient,
  request: PaymentCreateRequest,
  placeholderKey?: string | number
): Promise<WriteResult> {
  return client.write({
    method: 'POST',
    path: '/customerpayments',
    body: request,
    entity: 'payment',
    responseKey: 'payment',
    idField: 'payment_id',
    placeholderKey,
  });
}
