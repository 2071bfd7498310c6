import { describeError, isFatalError } from '../../errors';
import { isLive } from '../../freshbooks/types';
import { invoiceNumber, isInvoiceSent, mapInvoice } from '../../mappers/invoices';
import { createInvoice, listInvoices, markInvoiceSent } from '../../zoho/resources/invoices';
import { detail, StageContext } from '../context';
import { NamedRecord } from '../reconcile';
import { MigrationResult } from '../result';
import { ensureInvoiceCustomer } from './contacts';
import { dedupOrCreate, forEachRecord, seedIndex } from './shared';

export async function migrateInvoices(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating invoices...');

  const refetch = async (): Promise<NamedRecord[]> =>
    (await listInvoices(ctx.destination)).map(invoice => ({
      id: invoice.invoice_id,
      name: invoice.invoice_number ?? invoice.invoice_id,
    }));

  seedIndex(ctx, 'invoice', await refetch(), 'invoices');

  const invoices = await ctx.source.fetchInvoices();
  ctx.print(`Found ${invoices.length} invoices in FreshBooks`);

  let markedSent = 0;

  await forEachRecord(ctx, invoices, result, invoiceNumber, async invoice => {
    if (!isLive(invoice)) {
      result.recordSkip();
      return;
    }
    const number = invoiceNumber(invoice);

    let customerId = ctx.registry.resolve('customer', invoice.customerid);
    if (!customerId) {
      customerId = (await ensureInvoiceCustomer(ctx, invoice, number))?.id;
    }
    const request = customerId ? mapInvoice(invoice, () => customerId) : null;
    if (!request) {
      result.recordSkip();
      detail(ctx, `  [SKIP] Invoice ${number}: customer ${invoice.customerid ?? 'unknown'} not migrated`);
      return;
    }

    const outcome = await dedupOrCreate(
      ctx,
      {
        entity: 'invoice',
        sourceId: invoice.id,
        name: number,
        create: () => createInvoice(ctx.destination, request, number),
        refetch,
      },
      result
    );

    if (outcome.kind === 'existing' || !isInvoiceSent(invoice)) {
      return;
    }
    if (outcome.kind === 'placeholder') {
      detail(ctx, `  [DRY RUN] Would mark invoice ${number} as sent`);
      return;
    }
    try {
      await markInvoiceSent(ctx.destination, outcome.id);
      markedSent += 1;
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      const message = describeError(error);
      ctx.log.warn('Could not mark invoice as sent', { invoice: number, error: message });
      ctx.print(`  [WARNING] Invoice ${number} created but not marked as sent: ${message}`);
    }
  });

  if (markedSent > 0) {
    ctx.print(`Marked ${markedSent} invoices as sent`);
  }
}
