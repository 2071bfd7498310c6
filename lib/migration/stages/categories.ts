import { describeError, isFatalError } from '../../errors';
import { FreshBooksCategory } from '../../freshbooks/types';
import {
  categoryDedupKey,
  categoryName,
  createAccountRequest,
  isCostOfGoodsName,
  mapAccount,
  mapToDestinationCategory,
} from '../../mappers/accounts';
import { CategoryMapping } from '../../mappers/category-mapping';
import { createAccount, listAccounts, updateAccount } from '../../zoho/resources/accounts';
import { ZohoAccount } from '../../zoho/types';
import { detail, StageContext } from '../context';
import { normalizeKey } from '../id-registry';
import { NamedRecord } from '../reconcile';
import { MigrationResult } from '../result';
import { dedupOrCreate, forEachRecord, seedIndex } from './shared';

const MAX_LISTED_FALLBACKS = 10;

/** Expenses reference categories by categoryid, which FreshBooks mirrors in id */
function categorySourceId(category: FreshBooksCategory): number {
  return category.categoryid ?? category.id;
}

function sortByName(names: readonly string[]): string[] {
  return [...names].sort((a, b) => a.localeCompare(b));
}

/**
 * Load the chart of accounts, seed the account index and remember names and
 * the first existing expense account
 */
async function loadExistingAccounts(ctx: StageContext): Promise<ZohoAccount[]> {
  const accounts = await listAccounts(ctx.destination);
  seedIndex(
    ctx,
    'account',
    accounts.map(account => ({ id: account.account_id, name: account.account_name })),
    'accounts'
  );
  for (const account of accounts) {
    ctx.registry.accountNames.set(account.account_id, account.account_name);
  }
  const firstExpense = accounts.find(account => account.account_type === 'expense');
  if (firstExpense && !ctx.registry.defaultExpenseAccountId) {
    ctx.registry.defaultExpenseAccountId = firstExpense.account_id;
  }
  return accounts;
}

function accountRefetch(ctx: StageContext): () => Promise<NamedRecord[]> {
  return async () =>
    (await listAccounts(ctx.destination)).map(account => ({ id: account.account_id, name: account.account_name }));
}

/**
 * Expense categories → chart of accounts.
 *
 * Direct mode creates one account per distinct category. Hierarchical mode
 * builds the configured parent/child accounts and maps every source category
 * onto one of them.
 */
export async function migrateCategories(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating expense categories to accounts...');

  const existing = await loadExistingAccounts(ctx);
  const categories = await ctx.source.fetchCategories();
  ctx.print(`Found ${categories.length} expense categories in FreshBooks`);

  if (ctx.options.hierarchical && ctx.categoryMapping) {
    await migrateHierarchy(ctx, result, ctx.categoryMapping, existing, categories);
  } else {
    await migrateDirect(ctx, result, categories);
  }

  if (ctx.registry.defaultExpenseAccountId) {
    const name = ctx.registry.accountNames.get(ctx.registry.defaultExpenseAccountId) ?? 'unknown';
    detail(ctx, `Default expense account: ${name}`);
  }
}

async function migrateDirect(
  ctx: StageContext,
  result: MigrationResult,
  categories: readonly FreshBooksCategory[]
): Promise<void> {
  const refetch = accountRefetch(ctx);
  const canonical = new Map<string, string>();

  await forEachRecord(ctx, categories, result, categoryName, async category => {
    const key = categoryDedupKey(category);
    const sharedId = canonical.get(key);
    if (sharedId) {
      ctx.registry.register('account', categorySourceId(category), sharedId);
      result.recordSkip();
      detail(ctx, `  [DUPLICATE] ${categoryName(category)} shares an account with an earlier category`);
      return;
    }

    const request = mapAccount(category);
    const outcome = await dedupOrCreate(
      ctx,
      {
        entity: 'account',
        sourceId: categorySourceId(category),
        name: request.account_name,
        create: () => createAccount(ctx.destination, request, categorySourceId(category)),
        refetch,
      },
      result
    );

    canonical.set(key, outcome.id);
    ctx.registry.accountNames.set(outcome.id, request.account_name);
    if (!ctx.registry.defaultExpenseAccountId && request.account_type === 'expense') {
      ctx.registry.defaultExpenseAccountId = outcome.id;
    }
  });
}

async function migrateHierarchy(
  ctx: StageContext,
  result: MigrationResult,
  mapping: CategoryMapping,
  existing: readonly ZohoAccount[],
  categories: readonly FreshBooksCategory[]
): Promise<void> {
  const refetch = accountRefetch(ctx);
  const existingByName = new Map(existing.map(account => [normalizeKey(account.account_name), account]));
  const parentIds = new Map<string, string>();

  const ensureAccount = async (name: string, parentId: string | undefined, isCogs: boolean): Promise<string> => {
    const request = createAccountRequest(name, parentId, isCogs);
    const outcome = await dedupOrCreate(
      ctx,
      { entity: 'account', name, create: () => createAccount(ctx.destination, request, name), refetch },
      result
    );
    ctx.registry.accountNames.set(outcome.id, name);
    if (!ctx.registry.defaultExpenseAccountId && !isCogs) {
      ctx.registry.defaultExpenseAccountId = outcome.id;
    }
    return outcome.id;
  };

  const parents = sortByName(mapping.parentCategories);
  ctx.print(`Creating ${parents.length} parent accounts...`);
  await forEachRecord(ctx, parents, result, name => name, async parent => {
    parentIds.set(parent, await ensureAccount(parent, undefined, isCostOfGoodsName(parent)));
  });

  for (const parent of parents) {
    const parentId = parentIds.get(parent);
    const children = sortByName(mapping.children(parent));

    await forEachRecord(ctx, children, result, name => name, async child => {
      if (!parentId) {
        ctx.print(`  [WARNING] Parent '${parent}' not found for '${child}', will create as top-level`);
      }

      const current = existingByName.get(normalizeKey(child));
      if (current && parentId && current.parent_account_id !== parentId) {
        await reparent(ctx, current, parent, parentId);
      }

      await ensureAccount(child, parentId, isCostOfGoodsName(parent) || isCostOfGoodsName(child));
    });
  }

  mapSourceCategories(ctx, result, mapping, categories);
}

async function reparent(ctx: StageContext, account: ZohoAccount, parent: string, parentId: string): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.print(`  [WOULD UPDATE] ${account.account_name} → parent '${parent}'`);
    return;
  }
  try {
    await updateAccount(ctx.destination, account.account_id, { parent_account_id: parentId });
    ctx.print(`  [UPDATED] ${account.account_name} → parent '${parent}'`);
  } catch (error) {
    if (isFatalError(error)) {
      throw error;
    }
    const message = describeError(error);
    ctx.log.warn('Could not move account under its parent', { account: account.account_name, parent, error: message });
    ctx.print(`  [WARNING] Could not update parent of '${account.account_name}': ${message}`);
  }
}

/**
 * Point every source category at its destination account
 */
function mapSourceCategories(
  ctx: StageContext,
  result: MigrationResult,
  mapping: CategoryMapping,
  categories: readonly FreshBooksCategory[]
): void {
  const index = ctx.registry.index('account');
  const fallbacks: string[] = [];

  for (const category of categories) {
    const target = mapToDestinationCategory(category, mapping);
    const accountId = index.lookup(target.name);
    if (!accountId) {
      result.recordFailure(categoryName(category), `No destination account named '${target.name}'`);
      continue;
    }
    ctx.registry.register('account', categorySourceId(category), accountId);
    if (target.fallback) {
      fallbacks.push(categoryName(category));
    }
  }

  const defaultId = index.lookup(mapping.defaultCategory);
  if (defaultId) {
    ctx.registry.defaultExpenseAccountId = defaultId;
  }

  if (fallbacks.length > 0) {
    ctx.print(`${fallbacks.length} categories mapped to default '${mapping.defaultCategory}':`);
    for (const name of fallbacks.slice(0, MAX_LISTED_FALLBACKS)) {
      ctx.print(`  - ${name}`);
    }
    if (fallbacks.length > MAX_LISTED_FALLBACKS) {
      ctx.print(`  ... and ${fallbacks.length - MAX_LISTED_FALLBACKS} more`);
    }
  }
}
