import { describe, it, expect } from '@jest/globals';
import { InvoiceSchema } from '@/lib/freshbooks/types';
import { invoiceNumber, isInvoiceSent, mapInvoice } from '@/lib/mappers/invoices';

const customerFor = (id: number | null | undefined) => (id === 7 ? 'c-7' : undefined);

describe('isInvoiceSent', () => {
  it.each([
    [{ v3_status: 'draft', status: 2 }, false],
    [{ v3_status: 'Viewed' }, true],
    [{ v3_status: 'auto-paid' }, true],
    [{ status: 4 }, true],
    [{ status: 1 }, false],
    [{}, false],
  ])('%j → %s', (fields, expected) => {
    expect(isInvoiceSent(InvoiceSchema.parse({ id: 1, ...fields }))).toBe(expected);
  });
});

describe('mapInvoice', () => {
  it('maps header fields and lines with defaults for blanks', () => {
    const invoice = InvoiceSchema.parse({
      id: 11,
      customerid: 7,
      invoice_number: 'INV-001',
      po_number: 'PO-9',
      create_date: '2024-03-01',
      due_date: '2024-03-31',
      currency_code: 'USD',
      notes: 'Thanks',
      terms: 'Net 30',
      lines: [
        { name: 'Consulting', description: 'March', qty: '2', unit_cost: { amount: '150.00', code: 'USD' } },
        { qty: '', unit_cost: null },
      ],
    });

    expect(mapInvoice(invoice, customerFor)).toEqual({
      customer_id: 'c-7',
      invoice_number: 'INV-001',
      reference_number: 'PO-9',
      date: '2024-03-01',
      due_date: '2024-03-31',
      currency_code: 'USD',
      line_items: [
        { name: 'Consulting', description: 'March', rate: 150, quantity: 2 },
        { name: 'Item', rate: 0, quantity: 1 },
      ],
      notes: 'Thanks',
      terms: 'Net 30',
      is_inclusive_tax: false,
    });
  });

  it('bills the invoice total when there are no lines', () => {
    const invoice = InvoiceSchema.parse({
      id: 12,
      customerid: 7,
      amount: { amount: '99.95', code: 'USD' },
      description: 'Retainer',
    });

    expect(mapInvoice(invoice, customerFor)?.line_items).toEqual([
      { name: 'Invoice Total', description: 'Retainer', rate: 99.95, quantity: 1 },
    ]);
  });

  it('returns null when the customer has no destination id', () => {
    expect(mapInvoice(InvoiceSchema.parse({ id: 13, customerid: 8 }), customerFor)).toBeNull();
  });

  it('falls back to the source id as invoice number', () => {
    expect(invoiceNumber(InvoiceSchema.parse({ id: 14, invoice_number: '' }))).toBe('14');
  });
});
