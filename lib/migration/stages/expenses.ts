import { isLive } from '../../freshbooks/types';
import { expenseKey, mapExpense } from '../../mappers/expenses';
import { present } from '../../mappers/values';
import { createExpense, listExpenses } from '../../zoho/resources/expenses';
import { detail, StageContext } from '../context';
import { NamedRecord } from '../reconcile';
import { MigrationResult } from '../result';
import { ensureExpenseVendor } from './contacts';
import { dedupOrCreate, forEachRecord, seedIndex } from './shared';

function expenseLabel(expense: { id: number; date?: string | null; notes?: string | null }): string {
  return present(expense.notes) ?? (present(expense.date) ? `Expense on ${expense.date}` : `Expense ${expense.id}`);
}

export async function migrateExpenses(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating expenses...');

  // Listings report `total` with tax; requests carry the pre-tax amount
  const refetch = async (): Promise<NamedRecord[]> =>
    (await listExpenses(ctx.destination)).map(expense => ({
      id: expense.expense_id,
      name: expenseKey(
        expense.date,
        expense.total_without_tax ?? expense.amount ?? expense.total ?? 0,
        expense.reference_number,
        expense.description
      ),
    }));

  seedIndex(ctx, 'expense', await refetch(), 'expenses');

  const expenses = await ctx.source.fetchExpenses();
  ctx.print(`Found ${expenses.length} expenses in FreshBooks`);

  const tagCounts = new Map<string, number>();
  const unmappedPaidThrough = new Set<string>();

  await forEachRecord(ctx, expenses, result, expenseLabel, async expense => {
    if (!isLive(expense)) {
      result.recordSkip();
      return;
    }

    let vendorId = ctx.registry.resolve('vendor', expense.vendorid);
    if (!vendorId && present(expense.vendor)) {
      vendorId = (await ensureExpenseVendor(ctx, expense))?.id;
    }

    const mapping = mapExpense(expense, {
      accountFor: id => ctx.registry.resolve('account', id),
      vendorFor: () => vendorId,
      customerFor: id => ctx.registry.resolve('customer', id),
      accountNames: ctx.registry.accountNames,
      paidThrough: ctx.config.paidThroughMapping,
      taxFor: name => ctx.registry.index('tax').lookup(name),
      defaultAccountId: ctx.registry.defaultExpenseAccountId,
      tagger: ctx.tagger,
      today: ctx.today,
    });
    if (!mapping) {
      result.recordSkip();
      detail(ctx, `  [SKIP] ${expenseLabel(expense)}: no account for category ${expense.categoryid ?? 'none'} or no amount`);
      return;
    }

    const { request } = mapping;
    if (mapping.unmappedPaidThrough) {
      unmappedPaidThrough.add(mapping.unmappedPaidThrough);
    }

    const key = expenseKey(request.date, request.amount, request.reference_number, request.description);
    await dedupOrCreate(
      ctx,
      {
        entity: 'expense',
        sourceId: expense.id,
        name: key,
        create: () => createExpense(ctx.destination, request, expense.id),
        refetch,
      },
      result
    );

    if (mapping.businessLine) {
      const name = mapping.businessLine.name;
      tagCounts.set(name, (tagCounts.get(name) ?? 0) + 1);
    }
  });

  if (tagCounts.size > 0) {
    ctx.print('Business line tags:');
    for (const [name, count] of tagCounts) {
      ctx.print(`  ${name}: ${count}`);
    }
  }

  if (unmappedPaidThrough.size > 0) {
    ctx.print('Paid-through accounts with no mapping (add them to paid_through_mapping):');
    for (const name of [...unmappedPaidThrough].sort()) {
      ctx.print(`  - ${name}`);
    }
  }
}
