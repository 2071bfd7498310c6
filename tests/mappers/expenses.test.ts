import { describe, it, expect } from '@jest/globals';
import { BusinessTagConfig } from '@/lib/config';
import { ExpenseSchema } from '@/lib/freshbooks/types';
import { BusinessTagger } from '@/lib/mappers/business-tags';
import { expenseKey, ExpenseMappingTables, mapExpense } from '@/lib/mappers/expenses';

const TAGS: BusinessTagConfig = {
  primaryTag: 'Consulting',
  secondaryTag: 'Workshops',
  secondaryStartDate: '2024-01-01',
  secondaryKeywords: ['Workshop'],
  zohoTagId: 'tag-1',
  zohoPrimaryOptionId: 'opt-p',
  zohoSecondaryOptionId: 'opt-s',
};

const tables = (overrides: Partial<ExpenseMappingTables> = {}): ExpenseMappingTables => ({
  accountFor: id => (id === 5 ? 'acct-5' : undefined),
  vendorFor: id => (id === 2 ? 'v-2' : undefined),
  customerFor: () => undefined,
  accountNames: new Map([
    ['acct-5', 'Software'],
    ['acct-0', 'General'],
  ]),
  paidThrough: { 'business checking': 'acct-bank' },
  taxFor: name => (name === 'GST' ? 'tax-1' : undefined),
  defaultAccountId: 'acct-0',
  today: '2024-06-01',
  ...overrides,
});

describe('mapExpense', () => {
  it('resolves account, vendor, tax and paid-through account', () => {
    const expense = ExpenseSchema.parse({
      id: 1,
      categoryid: 5,
      vendorid: 2,
      amount: { amount: '42.10', code: 'USD' },
      date: '2024-05-02',
      notes: 'Annual licence',
      account_name: 'Business Checking',
      taxName1: 'GST',
      transactionid: 'TX-1',
      billable: false,
    });

    expect(mapExpense(expense, tables())).toEqual({
      request: {
        account_id: 'acct-5',
        paid_through_account_id: 'acct-bank',
        vendor_id: 'v-2',
        date: '2024-05-02',
        amount: 42.1,
        tax_id: 'tax-1',
        is_billable: false,
        currency_code: 'USD',
        reference_number: 'TX-1',
        description: 'Annual licence',
      },
      categoryName: 'Software',
    });
  });

  it('falls back to the default account and reports unmapped paid-through accounts', () => {
    const expense = ExpenseSchema.parse({ id: 2, categoryid: 99, amount: { amount: '5' }, account_name: 'Petty Cash' });

    const mapping = mapExpense(expense, tables());

    expect(mapping?.request.account_id).toBe('acct-0');
    expect(mapping?.request.date).toBe('2024-06-01');
    expect(mapping?.categoryName).toBe('General');
    expect(mapping?.unmappedPaidThrough).toBe('Petty Cash');
  });

  it('treats a paid-through name inherited from Object.prototype as unmapped', () => {
    const expense = ExpenseSchema.parse({ id: 3, categoryid: 5, amount: { amount: '5' }, account_name: 'Constructor' });

    const mapping = mapExpense(expense, tables());

    expect(mapping?.request.paid_through_account_id).toBeUndefined();
    expect(mapping?.unmappedPaidThrough).toBe('Constructor');
  });

  it('returns null without an account or a parsable amount', () => {
    const unmapped = ExpenseSchema.parse({ id: 3, categoryid: 99, amount: { amount: '5' } });
    const noAmount = ExpenseSchema.parse({ id: 4, categoryid: 5, amount: { amount: 'n/a' } });

    expect(mapExpense(unmapped, tables({ defaultAccountId: undefined }))).toBeNull();
    expect(mapExpense(noAmount, tables())).toBeNull();
  });

  it('tags the business line when a tagger is configured', () => {
    const expense = ExpenseSchema.parse({
      id: 5,
      categoryid: 5,
      amount: { amount: '300' },
      date: '2024-02-10',
      notes: 'WORKSHOP venue deposit',
    });

    const mapping = mapExpense(expense, tables({ tagger: new BusinessTagger(TAGS) }));

    expect(mapping?.businessLine).toEqual({ kind: 'secondary', name: 'Workshops' });
    expect(mapping?.request.tags).toEqual([{ tag_id: 'tag-1', tag_option_id: 'opt-s' }]);
  });
});

describe('expenseKey', () => {
  it('uses the day, the amount to the cent and the reference or description', () => {
    expect(expenseKey('2024-05-02 10:00:00', 42.1, null, 'Annual licence')).toBe('2024-05-02|42.10|Annual licence');
    expect(expenseKey('2024-05-02', 7, 'TX-9', 'ignored')).toBe('2024-05-02|7.00|TX-9');
  });
});
