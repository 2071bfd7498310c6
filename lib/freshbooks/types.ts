/**
 * FreshBooks accounting API record shapes
 *
 * Only fields the migration reads are declared; everything else passes
 * through untouched. Monetary amounts stay strings until a mapper parses them.
 */

import { z } from 'zod';

const text = z.string().nullish();
const int = z.number().int().nullish();
const numericString = z
  .union([z.string(), z.number()])
  .transform(value => String(value))
  .nullish();

export const MoneySchema = z.object({
  amount: numericString,
  code: text,
});

export type Money = z.infer<typeof MoneySchema>;

/** 0 or absent = active; anything else = archived or deleted */
const visState = int;

export const ClientSchema = z
  .object({
    id: z.number().int(),
    organization: text,
    fname: text,
    lname: text,
    email: text,
    bus_phone: text,
    home_phone: text,
    mob_phone: text,
    currency_code: text,
    note: text,
    vat_number: text,
    p_street: text,
    p_street2: text,
    p_city: text,
    p_province: text,
    p_code: text,
    p_country: text,
    s_street: text,
    s_street2: text,
    s_city: text,
    s_province: text,
    s_code: text,
    s_country: text,
    vis_state: visState,
  })
  .passthrough();

export const VendorSchema = z
  .object({
    id: z.number().int(),
    vendor_name: text,
    primary_contact_first_name: text,
    primary_contact_last_name: text,
    primary_contact_email: text,
    phone: text,
    website: text,
    street: text,
    street2: text,
    city: text,
    province: text,
    postal_code: text,
    country: text,
    currency_code: text,
    note: text,
    tax_id: text,
    vis_state: visState,
  })
  .passthrough();

export const InvoiceLineSchema = z
  .object({
    lineid: int,
    name: text,
    description: text,
    qty: numericString,
    unit_cost: MoneySchema.nullish(),
    amount: MoneySchema.nullish(),
  })
  .passthrough();

export const InvoiceSchema = z
  .object({
    id: z.number().int(),
    invoiceid: int,
    customerid: int,
    invoice_number: text,
    po_number: text,
    create_date: text,
    due_date: text,
    currency_code: text,
    amount: MoneySchema.nullish(),
    description: text,
    notes: text,
    terms: text,
    status: int,
    v3_status: text,
    organization: text,
    fname: text,
    lname: text,
    street: text,
    street2: text,
    city: text,
    province: text,
    code: text,
    country: text,
    vat_number: text,
    lines: z.array(InvoiceLineSchema).nullish(),
    vis_state: visState,
  })
  .passthrough();

export const ExpenseSchema = z
  .object({
    id: z.number().int(),
    expenseid: int,
    categoryid: int,
    vendorid: int,
    vendor: text,
    clientid: int,
    amount: MoneySchema.nullish(),
    date: text,
    notes: text,
    account_name: text,
    taxName1: text,
    transactionid: numericString,
    billable: z.boolean().nullish(),
    vis_state: visState,
  })
  .passthrough();

export const PaymentSchema = z
  .object({
    id: z.number().int(),
    clientid: int,
    invoiceid: int,
    amount: MoneySchema.nullish(),
    date: text,
    gateway: text,
    type: text,
    note: text,
    transactionid: numericString,
    orderid: numericString,
    vis_state: visState,
  })
  .passthrough();

export const CategorySchema = z
  .object({
    id: z.number().int(),
    categoryid: int,
    category: text,
    is_cogs: z.boolean().nullish(),
    parentid: int,
    vis_state: visState,
  })
  .passthrough();

export const TaxSchema = z
  .object({
    id: z.number().int(),
    taxid: int,
    name: text,
    amount: numericString,
    number: text,
    compound: z.boolean().nullish(),
  })
  .passthrough();

export const ItemSchema = z
  .object({
    id: z.number().int(),
    itemid: int,
    name: text,
    description: text,
    sku: text,
    unit_cost: MoneySchema.nullish(),
    vis_state: visState,
  })
  .passthrough();

export type FreshBooksClientRecord = z.infer<typeof ClientSchema>;
export type FreshBooksVendor = z.infer<typeof VendorSchema>;
export type FreshBooksInvoiceLine = z.infer<typeof InvoiceLineSchema>;
export type FreshBooksInvoice = z.infer<typeof InvoiceSchema>;
export type FreshBooksExpense = z.infer<typeof ExpenseSchema>;
export type FreshBooksPayment = z.infer<typeof PaymentSchema>;
export type FreshBooksCategory = z.infer<typeof CategorySchema>;
export type FreshBooksTax = z.infer<typeof TaxSchema>;
export type FreshBooksItem = z.infer<typeof ItemSchema>;

/**
 * Listing envelope: { response: { result: { <key>: [...], page, pages, per_page, total } } }
 */
export const ListResultSchema = z.object({
  response: z.object({
    result: z
      .object({
        page: z.number().int(),
        pages: z.number().int(),
        per_page: z.number().int().optional(),
        total: z.number().int().optional(),
      })
      .passthrough(),
  }),
});

export function isLive(record: { vis_state?: number | null }): boolean {
  return record.vis_state === undefined || record.vis_state === null || record.vis_state === 0;
}
