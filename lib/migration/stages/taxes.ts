import { mapTax } from '../../mappers/catalog';
import { createTax, listTaxes } from '../../zoho/resources/taxes';
import { StageContext } from '../context';
import { NamedRecord } from '../reconcile';
import { MigrationResult } from '../result';
import { dedupOrCreate, forEachRecord, seedIndex } from './shared';

export async function migrateTaxes(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating taxes...');

  const refetch = async (): Promise<NamedRecord[]> =>
    (await listTaxes(ctx.destination)).map(tax => ({ id: tax.tax_id, name: tax.tax_name }));

  seedIndex(ctx, 'tax', await refetch(), 'taxes');

  const taxes = await ctx.source.fetchTaxes();
  ctx.print(`Found ${taxes.length} taxes in FreshBooks`);

  await forEachRecord(
    ctx,
    taxes,
    result,
    tax => tax.name ?? `Tax ${tax.id}`,
    async tax => {
      const request = mapTax(tax);
      if (!request) {
        result.recordSkip();
        return;
      }
      await dedupOrCreate(
        ctx,
        {
          entity: 'tax',
          sourceId: tax.id,
          name: request.tax_name,
          create: () => createTax(ctx.destination, request, tax.id),
          refetch,
        },
        result
      );
    }
  );
}
