/**
 * Zoho Books API v3 shapes
 *
 * Read-side entities are zod schemas so listings are validated at the
 * boundary; write-side requests are plain interfaces built by the mappers.
 */

import { z } from 'zod';

const id = z.union([z.string(), z.number()]).transform(value => String(value));

export const EnvelopeSchema = z
  .object({
    code: z.number(),
    message: z.string().optional(),
  })
  .passthrough();

export const PageContextSchema = z
  .object({
    page: z.number().optional(),
    per_page: z.number().optional(),
    has_more_page: z.boolean().optional(),
  })
  .passthrough();

export const AccountSchema = z
  .object({
    account_id: id,
    account_name: z.string(),
    account_type: z.string().optional(),
    account_code: z.string().nullish(),
    parent_account_id: z.string().nullish(),
    parent_account_name: z.string().nullish(),
    is_active: z.boolean().optional(),
  })
  .passthrough();

export const TaxSchema = z
  .object({
    tax_id: id,
    tax_name: z.string(),
    tax_percentage: z.number().optional(),
    tax_type: z.string().optional(),
  })
  .passthrough();

export const ItemSchema = z
  .object({
    item_id: id,
    name: z.string(),
    rate: z.number().optional(),
    sku: z.string().nullish(),
    status: z.string().optional(),
  })
  .passthrough();

export const ContactSchema = z
  .object({
    contact_id: id,
    contact_name: z.string(),
    company_name: z.string().nullish(),
    contact_type: z.string().optional(),
  })
  .passthrough();

export const InvoiceSchema = z
  .object({
    invoice_id: id,
    invoice_number: z.string().nullish(),
    customer_id: z.string().nullish(),
    status: z.string().optional(),
    date: z.string().optional(),
    total: z.number().optional(),
  })
  .passthrough();

export const ExpenseSchema = z
  .object({
    expense_id: id,
    date: z.string().optional(),
    total: z.number().optional(),
    total_without_tax: z.number().optional(),
    amount: z.number().optional(),
    reference_number: z.string().nullish(),
    description: z.string().nullish(),
  })
  .passthrough();

export const PaymentSchema = z
  .object({
    payment_id: id,
    customer_id: z.string().nullish(),
    date: z.string().optional(),
    amount: z.number().optional(),
    reference_number: z.string().nullish(),
  })
  .passthrough();

export type ZohoAccount = z.infer<typeof AccountSchema>;
export type ZohoTax = z.infer<typeof TaxSchema>;
export type ZohoItem = z.infer<typeof ItemSchema>;
export type ZohoContact = z.infer<typeof ContactSchema>;
export type ZohoInvoice = z.infer<typeof InvoiceSchema>;
export type ZohoExpense = z.infer<typeof ExpenseSchema>;
export type ZohoPayment = z.infer<typeof PaymentSchema>;

export type ContactType = 'customer' | 'vendor';
export type AccountType = 'expense' | 'cost_of_goods_sold';

export interface AccountCreateRequest {
  account_name: string;
  account_type: AccountType;
  account_code?: string;
  description?: string;
  parent_account_id?: string;
}

export interface AccountUpdateRequest {
  parent_account_id: string;
}

export interface TaxCreateRequest {
  tax_name: string;
  tax_percentage: number;
  tax_type: 'tax';
}

export interface ItemCreateRequest {
  name: string;
  description?: string;
  rate?: number;
  sku?: string;
  product_type: 'goods' | 'service';
}

export interface Address {
  address?: string;
  city?: string;
  state?: string;
  zip?: string;
  country?: string;
  phone?: string;
}

export interface ContactPerson {
  first_name?: string;
  last_name?: string;
  email?: string;
  phone?: string;
  mobile?: string;
  is_primary_contact: boolean;
}

export interface ContactCreateRequest {
  contact_name: string;
  company_name?: string;
  contact_type: ContactType;
  billing_address?: Address;
  shipping_address?: Address;
  contact_persons?: ContactPerson[];
  currency_code?: string;
  notes?: string;
  website?: string;
  tax_id?: string;
}

export interface InvoiceLineItemRequest {
  name: string;
  description?: string;
  rate: number;
  quantity: number;
}

export interface InvoiceCreateRequest {
  customer_id: string;
  invoice_number?: string;
  reference_number?: string;
  date?: string;
  due_date?: string;
  currency_code?: string;
  line_items: InvoiceLineItemRequest[];
  notes?: string;
  terms?: string;
  is_inclusive_tax: boolean;
}

export interface ExpenseTag {
  tag_id: string;
  tag_option_id: string;
}

export interface ExpenseCreateRequest {
  account_id: string;
  paid_through_account_id?: string;
  vendor_id?: string;
  date: string;
  amount: number;
  tax_id?: string;
  is_billable?: boolean;
  customer_id?: string;
  currency_code?: string;
  reference_number?: string;
  description?: string;
  tags?: ExpenseTag[];
}

export interface PaymentInvoiceApplication {
  invoice_id: string;
  amount_applied: number;
}

export type PaymentMode = 'cash' | 'check' | 'credit_card' | 'bank_transfer' | 'paypal';

export interface PaymentCreateRequest {
  customer_id: string;
  payment_mode: PaymentMode;
  amount: number;
  date: string;
  reference_number?: string;
  description?: string;
  account_id?: string;
  invoices?: PaymentInvoiceApplication[];
}
