import { FreshBooksCategory } from '../freshbooks/types';
import { AccountCreateRequest } from '../zoho/types';
import { CategoryMapping } from './category-mapping';
import { present } from './values';

export const IMPORTED_CATEGORY_DESCRIPTION = 'Imported from FreshBooks category';

export function categoryName(category: FreshBooksCategory): string {
  return present(category.category) ?? 'Unknown Category';
}

export function isCostOfGoodsName(name: string): boolean {
  return name.toLowerCase().includes('cost of');
}

/**
 * One expense category → one account (direct mode)
 */
export function mapAccount(category: FreshBooksCategory): AccountCreateRequest {
  return {
    account_name: categoryName(category),
    account_type: category.is_cogs === true ? 'cost_of_goods_sold' : 'expense',
    account_code: category.categoryid !== null && category.categoryid !== undefined
      ? String(category.categoryid)
      : undefined,
    description: IMPORTED_CATEGORY_DESCRIPTION,
  };
}

/**
 * Account named in the configured hierarchy (hierarchical mode)
 */
export function createAccountRequest(
  name: string,
  parentAccountId: string | undefined,
  isCogs: boolean
): AccountCreateRequest {
  return {
    account_name: name,
    account_type: isCogs ? 'cost_of_goods_sold' : 'expense',
    description: IMPORTED_CATEGORY_DESCRIPTION,
    parent_account_id: parentAccountId,
  };
}

export interface CategoryTarget {
  name: string;
  /** true when the mapped name is not in the hierarchy and the default was used */
  fallback: boolean;
}

/**
 * Destination category for a source category. Names outside the configured
 * hierarchy go to the default category.
 */
export function mapToDestinationCategory(category: FreshBooksCategory, mapping: CategoryMapping): CategoryTarget {
  const mapped = mapping.destinationFor(categoryName(category));
  if (mapping.categoryExists(mapped)) {
    return { name: mapped, fallback: false };
  }
  return { name: mapping.defaultCategory, fallback: true };
}

/**
 * Key used to collapse duplicate source categories before creating accounts
 */
export function categoryDedupKey(category: FreshBooksCategory): string {
  return `${categoryName(category).trim().toLowerCase()}|${category.is_cogs === true ? 'cogs' : 'expense'}`;
}
