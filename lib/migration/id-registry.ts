/**
 * Run-scoped source → destination id bookkeeping
 */

import { RegistryConflictError } from '../errors';

export type EntityKind =
  | 'account'
  | 'tax'
  | 'item'
  | 'customer'
  | 'vendor'
  | 'invoice'
  | 'expense'
  | 'payment';

/**
 * Normalize a natural key (name, number, composite key) for dedup lookups
 */
export function normalizeKey(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Case-insensitive natural key → destination id index.
 * The first id stored for a key wins.
 */
export class DedupIndex {
  private readonly entries = new Map<string, string>();

  lookup(key: string): string | undefined {
    return this.entries.get(normalizeKey(key));
  }

  /**
   * @returns false when the key was already present (the stored id is kept)
   */
  add(key: string, destinationId: string): boolean {
    const normalized = normalizeKey(key);
    if (!normalized || this.entries.has(normalized)) {
      return false;
    }
    this.entries.set(normalized, destinationId);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * IdMappingRegistry holds, per entity kind, the source id → destination id
 * mapping and the dedup index of destination records.
 *
 * A source id maps to one destination id for the whole run. Re-registering
 * the same pair is a no-op; a different destination id is a logic error.
 */
export class IdMappingRegistry {
  private readonly mappings = new Map<EntityKind, Map<number, string>>();
  private readonly indexes = new Map<EntityKind, DedupIndex>();

  /** destination account id → category name, for expense descriptions and tagging */
  readonly accountNames = new Map<string, string>();

  /** Fallback account for expenses whose category did not map */
  defaultExpenseAccountId: string | undefined;

  register(entity: EntityKind, sourceId: number, destinationId: string): void {
    const mapping = this.mappingFor(entity);
    const existing = mapping.get(sourceId);
    if (existing !== undefined) {
      if (existing !== destinationId) {
        throw new RegistryConflictError(entity, sourceId, existing, destinationId);
      }
      return;
    }
    mapping.set(sourceId, destinationId);
  }

  resolve(entity: EntityKind, sourceId: number | null | undefined): string | undefined {
    if (sourceId === null || sourceId === undefined) {
      return undefined;
    }
    return this.mappings.get(entity)?.get(sourceId);
  }

  count(entity: EntityKind): number {
    return this.mappings.get(entity)?.size ?? 0;
  }

  index(entity: EntityKind): DedupIndex {
    let index = this.indexes.get(entity);
    if (!index) {
      index = new DedupIndex();
      this.indexes.set(entity, index);
    }
    return index;
  }

  private mappingFor(entity: EntityKind): Map<number, string> {
    let mapping = this.mappings.get(entity);
    if (!mapping) {
      mapping = new Map();
      this.mappings.set(entity, mapping);
    }
    return mapping;
  }
}
