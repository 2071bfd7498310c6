import { FreshBooksInvoice } from '../freshbooks/types';
import { InvoiceCreateRequest, InvoiceLineItemRequest } from '../zoho/types';
import { parseDecimal, parseMoney, present } from './values';

export type IdLookup = (sourceId: number | null | undefined) => string | undefined;

/** Natural key: the invoice number, else the source id */
export function invoiceNumber(invoice: FreshBooksInvoice): string {
  return present(invoice.invoice_number) ?? String(invoice.id);
}

const SENT_STATUS_NAMES = new Set([
  'sent',
  'viewed',
  'paid',
  'partial',
  'overdue',
  'disputed',
  'auto-paid',
  'retry',
  'failed',
]);

const SENT_STATUS_CODES = new Set([2, 3, 4, 5, 6, 7, 8]);

/**
 * Whether the invoice left draft in FreshBooks. The string v3_status wins
 * when present; the numeric status is the fallback.
 */
export function isInvoiceSent(invoice: FreshBooksInvoice): boolean {
  const v3Status = present(invoice.v3_status)?.toLowerCase();
  if (v3Status) {
    return SENT_STATUS_NAMES.has(v3Status);
  }
  return invoice.status !== null && invoice.status !== undefined && SENT_STATUS_CODES.has(invoice.status);
}

function mapLines(invoice: FreshBooksInvoice): InvoiceLineItemRequest[] {
  const lines: InvoiceLineItemRequest[] = (invoice.lines ?? []).map(line => ({
    name: present(line.name) ?? 'Item',
    description: present(line.description),
    rate: parseMoney(line.unit_cost) ?? 0,
    quantity: parseDecimal(line.qty) ?? 1,
  }));

  if (lines.length === 0) {
    const total = parseMoney(invoice.amount);
    if (total !== undefined) {
      lines.push({
        name: 'Invoice Total',
        description: present(invoice.description),
        rate: total,
        quantity: 1,
      });
    }
  }
  return lines;
}

/**
 * @returns null when the invoice's customer has no destination id
 */
export function mapInvoice(invoice: FreshBooksInvoice, customerFor: IdLookup): InvoiceCreateRequest | null {
  const customerId = customerFor(invoice.customerid);
  if (!customerId) {
    return null;
  }
  return {
    customer_id: customerId,
    invoice_number: present(invoice.invoice_number),
    reference_number: present(invoice.po_number),
    date: present(invoice.create_date),
    due_date: present(invoice.due_date),
    currency_code: present(invoice.currency_code),
    line_items: mapLines(invoice),
    notes: present(invoice.notes),
    terms: present(invoice.terms),
    is_inclusive_tax: false,
  };
}
