import { isLive } from '../../freshbooks/types';
import { mapPayment, paymentKey, paymentLabel } from '../../mappers/payments';
import { createPayment, listPayments } from '../../zoho/resources/payments';
import { detail, StageContext } from '../context';
import { NamedRecord } from '../reconcile';
import { MigrationResult } from '../result';
import { dedupOrCreate, forEachRecord, seedIndex } from './shared';

export async function migratePayments(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating payments...');

  const refetch = async (): Promise<NamedRecord[]> =>
    (await listPayments(ctx.destination)).map(payment => ({
      id: payment.payment_id,
      name: paymentKey(payment.customer_id ?? '', payment.date, payment.amount ?? 0, payment.reference_number),
    }));

  seedIndex(ctx, 'payment', await refetch(), 'payments');

  const payments = await ctx.source.fetchPayments();
  ctx.print(`Found ${payments.length} payments in FreshBooks`);

  const unmappedDeposit = new Set<string>();

  await forEachRecord(ctx, payments, result, paymentLabel, async payment => {
    if (!isLive(payment)) {
      result.recordSkip();
      return;
    }

    const mapping = mapPayment(payment, {
      customerFor: id => ctx.registry.resolve('customer', id),
      invoiceFor: id => ctx.registry.resolve('invoice', id),
      depositAccounts: ctx.config.depositAccountMapping,
      today: ctx.today,
    });
    if (!mapping) {
      result.recordSkip();
      detail(ctx, `  [SKIP] ${paymentLabel(payment)}: customer not migrated or amount not positive`);
      return;
    }

    const { request } = mapping;
    if (mapping.unmappedDepositKey) {
      unmappedDeposit.add(mapping.unmappedDepositKey);
    }

    await dedupOrCreate(
      ctx,
      {
        entity: 'payment',
        sourceId: payment.id,
        name: paymentKey(request.customer_id, request.date, request.amount, request.reference_number),
        create: () => createPayment(ctx.destination, request, payment.id),
        refetch,
      },
      result
    );
  });

  if (unmappedDeposit.size > 0) {
    ctx.print('Payment gateways/types with no deposit account (add them to deposit_account_mapping):');
    for (const name of [...unmappedDeposit].sort()) {
      ctx.print(`  - ${name}`);
    }
  }
}
