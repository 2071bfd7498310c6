/**
 * Tax and item mappers
 */

import { FreshBooksItem, FreshBooksTax } from '../freshbooks/types';
import { ItemCreateRequest, TaxCreateRequest } from '../zoho/types';
import { parseDecimal, parseMoney, present } from './values';

/**
 * @returns null for taxes without a name
 */
export function mapTax(tax: FreshBooksTax): TaxCreateRequest | null {
  const name = present(tax.name);
  if (!name) {
    return null;
  }
  return {
    tax_name: name,
    tax_percentage: parseDecimal(tax.amount) ?? 0,
    tax_type: 'tax',
  };
}

export function itemName(item: FreshBooksItem): string {
  return present(item.name) ?? `Item ${item.id}`;
}

export function mapItem(item: FreshBooksItem): ItemCreateRequest {
  return {
    name: itemName(item),
    description: present(item.description),
    rate: parseMoney(item.unit_cost),
    sku: present(item.sku),
    product_type: 'goods',
  };
}
