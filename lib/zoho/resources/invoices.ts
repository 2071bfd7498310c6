/**
 * Invoice resource helpers
 * Endpoint: /invoices
 */

import { ZohoBooksClient, WriteResult } from '../http/client';
import { InvoiceCreateRequest, InvoiceSchema, ZohoInvoice } from '../types';

export async function listInvoices(client: ZohoBooksClient): Promise<ZohoInvoice[]> {
  return client.listAll('/invoices', 'invoices', InvoiceSchema);
}

export async function createInvoice(
  client: ZohoBooksClient,
  request: InvoiceCreateRequest,
  placeholderKey?: string | number
): Promise<WriteResult> {
  return client.write({
    method: 'POST',
    path: '/invoices',
    body: request,
    entity: 'invoice',
    responseKey: 'invoice',
    idField: 'invoice_id',
    placeholderKey,
  });
}

/**
 * Mark a draft invoice as sent without emailing the customer
 * POST /invoices/{invoice_id}/status/sent
 */
export async function markInvoiceSent(client: ZohoBooksClient, invoiceId: string): Promise<void> {
  await client.action({ method: 'POST', path: `/invoices/${encodeURIComponent(invoiceId)}/status/sent` });
}
