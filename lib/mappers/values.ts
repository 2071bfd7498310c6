/**
 * Parsing helpers shared by the field mappers
 */

import { Money } from '../freshbooks/types';

/**
 * Parse a FreshBooks decimal string. Empty or non-numeric input yields undefined.
 */
export function parseDecimal(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseMoney(money: Money | null | undefined): number | undefined {
  return parseDecimal(money?.amount);
}

/**
 * yyyy-MM-dd in UTC
 */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Drop null, undefined and blank strings so payloads only carry real values
 */
export function present(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function joinLines(...parts: Array<string | null | undefined>): string | undefined {
  const lines = parts.map(present).filter((part): part is string => part !== undefined);
  return lines.length > 0 ? lines.join('\n') : undefined;
}

/**
 * Value stored under `key` itself, never one inherited from Object.prototype
 */
export function ownValue<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}
