import { describe, it, expect } from '@jest/globals';
import { RegistryConflictError } from '@/lib/errors';
import { DedupIndex, IdMappingRegistry, normalizeKey } from '@/lib/migration/id-registry';

describe('normalizeKey', () => {
  it('trims, collapses whitespace and lowercases', () => {
    expect(normalizeKey('  Acme   Corp\t Ltd ')).toBe('acme corp ltd');
  });
});

describe('DedupIndex', () => {
  it('looks keys up case-insensitively and keeps the first id', () => {
    const index = new DedupIndex();

    expect(index.add('Acme Corp', 'c-1')).toBe(true);
    expect(index.add('ACME  corp', 'c-2')).toBe(false);
    expect(index.add('   ', 'c-3')).toBe(false);

    expect(index.lookup('acme corp')).toBe('c-1');
    expect(index.lookup('Globex')).toBeUndefined();
    expect(index.size).toBe(1);
  });
});

describe('IdMappingRegistry', () => {
  it('resolves registered ids per entity kind', () => {
    const registry = new IdMappingRegistry();
    registry.register('customer', 7, 'c-1');
    registry.register('vendor', 7, 'v-1');

    expect(registry.resolve('customer', 7)).toBe('c-1');
    expect(registry.resolve('vendor', 7)).toBe('v-1');
    expect(registry.resolve('invoice', 7)).toBeUndefined();
    expect(registry.resolve('customer', null)).toBeUndefined();
    expect(registry.count('customer')).toBe(1);
  });

  it('accepts the same pair twice', () => {
    const registry = new IdMappingRegistry();
    registry.register('tax', 1, 't-1');

    expect(() => registry.register('tax', 1, 't-1')).not.toThrow();
    expect(registry.count('tax')).toBe(1);
  });

  it('refuses to remap a source id', () => {
    const registry = new IdMappingRegistry();
    registry.register('invoice', 3, 'i-1');

    expect(() => registry.register('invoice', 3, 'i-2')).toThrow(RegistryConflictError);
    expect(registry.resolve('invoice', 3)).toBe('i-1');
  });

  it('keeps one dedup index per entity kind', () => {
    const registry = new IdMappingRegistry();
    registry.index('item').add('Widget', 'item-1');

    expect(registry.index('item').lookup('widget')).toBe('item-1');
    expect(registry.index('tax').size).toBe(0);
  });
});
