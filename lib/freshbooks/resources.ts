/**
 * FreshBooks listings read by the migration
 */

import { FreshBooksClient } from './http/client';
import { fetchAll, SourceResource } from './pagination';
import {
  CategorySchema,
  ClientSchema,
  ExpenseSchema,
  FreshBooksCategory,
  FreshBooksClientRecord,
  FreshBooksExpense,
  FreshBooksInvoice,
  FreshBooksItem,
  FreshBooksPayment,
  FreshBooksTax,
  FreshBooksVendor,
  InvoiceSchema,
  ItemSchema,
  PaymentSchema,
  TaxSchema,
  VendorSchema,
} from './types';

export const CLIENTS: SourceResource<FreshBooksClientRecord> = {
  path: 'users/clients',
  key: 'clients',
  schema: ClientSchema,
};

export const VENDORS: SourceResource<FreshBooksVendor> = {
  path: 'bill_vendors/bill_vendors',
  key: 'bill_vendors',
  schema: VendorSchema,
};

export const INVOICES: SourceResource<FreshBooksInvoice> = {
  path: 'invoices/invoices',
  key: 'invoices',
  schema: InvoiceSchema,
  query: { 'include[]': 'lines' },
};

export const EXPENSES: SourceResource<FreshBooksExpense> = {
  path: 'expenses/expenses',
  key: 'expenses',
  schema: ExpenseSchema,
};

export const CATEGORIES: SourceResource<FreshBooksCategory> = {
  path: 'expenses/categories',
  key: 'categories',
  schema: CategorySchema,
};

export const ITEMS: SourceResource<FreshBooksItem> = {
  path: 'items/items',
  key: 'items',
  schema: ItemSchema,
};

export const TAXES: SourceResource<FreshBooksTax> = {
  path: 'taxes/taxes',
  key: 'taxes',
  schema: TaxSchema,
};

export const PAYMENTS: SourceResource<FreshBooksPayment> = {
  path: 'payments/payments',
  key: 'payments',
  schema: PaymentSchema,
};

/**
 * Typed readers for each source entity type
 */
export class FreshBooksReader {
  constructor(private readonly client: FreshBooksClient) {}

  fetchClients(): Promise<FreshBooksClientRecord[]> {
    return fetchAll(this.client, CLIENTS);
  }

  fetchVendors(): Promise<FreshBooksVendor[]> {
    return fetchAll(this.client, VENDORS);
  }

  fetchInvoices(): Promise<FreshBooksInvoice[]> {
    return fetchAll(this.client, INVOICES);
  }

  fetchExpenses(): Promise<FreshBooksExpense[]> {
    return fetchAll(this.client, EXPENSES);
  }

  fetchCategories(): Promise<FreshBooksCategory[]> {
    return fetchAll(this.client, CATEGORIES);
  }

  fetchItems(): Promise<FreshBooksItem[]> {
    return fetchAll(this.client, ITEMS);
  }

  fetchTaxes(): Promise<FreshBooksTax[]> {
    return fetchAll(this.client, TAXES);
  }

  fetchPayments(): Promise<FreshBooksPayment[]> {
    return fetchAll(this.client, PAYMENTS);
  }
}
