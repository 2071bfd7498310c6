import { FreshBooksExpense } from '../freshbooks/types';
import { ExpenseCreateRequest } from '../zoho/types';
import { BusinessLine, BusinessTagger } from './business-tags';
import { IdLookup } from './invoices';
import { isoDate, ownValue, parseMoney, present } from './values';

export interface ExpenseMappingTables {
  accountFor: IdLookup;
  vendorFor: IdLookup;
  customerFor: IdLookup;
  /** destination account id → category name */
  accountNames: ReadonlyMap<string, string>;
  /** source paid-through account name (lowercased) → destination account id */
  paidThrough: Readonly<Record<string, string>>;
  /** source tax name → destination tax id */
  taxFor: (name: string) => string | undefined;
  defaultAccountId?: string;
  tagger?: BusinessTagger;
  today?: string;
}

export interface ExpenseMapping {
  request: ExpenseCreateRequest;
  categoryName: string;
  businessLine?: BusinessLine;
  /** Source paid-through account name with no configured destination account */
  unmappedPaidThrough?: string;
}

/**
 * @returns null when neither the category nor a default gives an account,
 *   or when the amount does not parse
 */
export function mapExpense(expense: FreshBooksExpense, tables: ExpenseMappingTables): ExpenseMapping | null {
  const mappedAccount = tables.accountFor(expense.categoryid);
  const accountId = mappedAccount ?? tables.defaultAccountId;
  if (!accountId) {
    return null;
  }
  const categoryName = tables.accountNames.get(accountId) ?? (mappedAccount ? 'Unknown' : 'Uncategorized');

  const amount = parseMoney(expense.amount);
  if (amount === undefined) {
    return null;
  }

  let paidThroughAccountId: string | undefined;
  let unmappedPaidThrough: string | undefined;
  const sourceAccountName = present(expense.account_name);
  if (sourceAccountName) {
    paidThroughAccountId = ownValue(tables.paidThrough, sourceAccountName.toLowerCase());
    if (!paidThroughAccountId) {
      unmappedPaidThrough = sourceAccountName;
    }
  }

  const taxName = present(expense.taxName1);
  const businessLine = tables.tagger?.determine(expense.date, expense.notes);

  return {
    request: {
      account_id: accountId,
      paid_through_account_id: paidThroughAccountId,
      vendor_id: tables.vendorFor(expense.vendorid),
      date: present(expense.date) ?? tables.today ?? isoDate(new Date()),
      amount,
      tax_id: taxName ? tables.taxFor(taxName) : undefined,
      is_billable: expense.billable ?? undefined,
      customer_id: tables.customerFor(expense.clientid),
      currency_code: present(expense.amount?.code),
      reference_number: present(expense.transactionid),
      description: present(expense.notes),
      tags: businessLine && tables.tagger ? tables.tagger.tagsFor(businessLine) : undefined,
    },
    categoryName,
    businessLine,
    unmappedPaidThrough,
  };
}

/**
 * Natural key of an expense: day, amount to the cent, then reference or description
 */
export function expenseKey(
  date: string | null | undefined,
  amount: number,
  reference: string | null | undefined,
  description: string | null | undefined
): string {
  const day = (date ?? '').slice(0, 10);
  return `${day}|${amount.toFixed(2)}|${present(reference) ?? present(description) ?? ''}`;
}
