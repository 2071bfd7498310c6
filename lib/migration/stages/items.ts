import { isLive } from '../../freshbooks/types';
import { itemName, mapItem } from '../../mappers/catalog';
import { createItem, listItems } from '../../zoho/resources/items';
import { StageContext } from '../context';
import { NamedRecord } from '../reconcile';
import { MigrationResult } from '../result';
import { dedupOrCreate, forEachRecord, seedIndex } from './shared';

export async function migrateItems(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating items/products...');

  const refetch = async (): Promise<NamedRecord[]> =>
    (await listItems(ctx.destination)).map(item => ({ id: item.item_id, name: item.name }));

  seedIndex(ctx, 'item', await refetch(), 'items');

  const items = await ctx.source.fetchItems();
  ctx.print(`Found ${items.length} items in FreshBooks`);

  await forEachRecord(ctx, items, result, itemName, async item => {
    if (!isLive(item)) {
      result.recordSkip();
      return;
    }
    const request = mapItem(item);
    await dedupOrCreate(
      ctx,
      {
        entity: 'item',
        sourceId: item.id,
        name: request.name,
        create: () => createItem(ctx.destination, request, item.id),
        refetch,
      },
      result
    );
  });
}
