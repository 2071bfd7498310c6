import { isFatalError, describeError } from '../../errors';
import { FreshBooksExpense, FreshBooksInvoice, isLive } from '../../freshbooks/types';
import {
  customerDisplayName,
  mapCustomer,
  mapCustomerFromInvoice,
  mapVendor,
  mapVendorFromExpense,
  vendorDisplayName,
} from '../../mappers/contacts';
import { createContact, listContacts } from '../../zoho/resources/contacts';
import { ContactCreateRequest, ContactType } from '../../zoho/types';
import { StageContext } from '../context';
import { EntityKind } from '../id-registry';
import { createOrReconcile, NamedRecord } from '../reconcile';
import { MigrationResult } from '../result';
import { dedupOrCreate, forEachRecord, seedIndex } from './shared';

function contactsOf(ctx: StageContext, contactType: ContactType): () => Promise<NamedRecord[]> {
  return async () =>
    (await listContacts(ctx.destination, contactType)).map(contact => ({
      id: contact.contact_id,
      name: contact.contact_name,
    }));
}

export async function migrateCustomers(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating clients to customers...');

  const refetch = contactsOf(ctx, 'customer');
  seedIndex(ctx, 'customer', await refetch(), 'customers');

  const clients = await ctx.source.fetchClients();
  ctx.print(`Found ${clients.length} clients in FreshBooks`);

  await forEachRecord(ctx, clients, result, customerDisplayName, async client => {
    if (!isLive(client)) {
      result.recordSkip();
      return;
    }
    const request = mapCustomer(client);
    await dedupOrCreate(
      ctx,
      {
        entity: 'customer',
        sourceId: client.id,
        name: request.contact_name,
        create: () => createContact(ctx.destination, request, client.id),
        refetch,
      },
      result
    );
  });
}

export async function migrateVendors(ctx: StageContext, result: MigrationResult): Promise<void> {
  ctx.print('Migrating vendors...');

  const refetch = contactsOf(ctx, 'vendor');
  seedIndex(ctx, 'vendor', await refetch(), 'vendors');

  const vendors = await ctx.source.fetchVendors();
  ctx.print(`Found ${vendors.length} vendors in FreshBooks`);

  await forEachRecord(ctx, vendors, result, vendorDisplayName, async vendor => {
    if (!isLive(vendor)) {
      result.recordSkip();
      return;
    }
    const request = mapVendor(vendor);
    await dedupOrCreate(
      ctx,
      {
        entity: 'vendor',
        sourceId: vendor.id,
        name: request.contact_name,
        create: () => createContact(ctx.destination, request, vendor.id),
        refetch,
      },
      result
    );
  });
}

export interface SynthesizedContact {
  id: string;
  created: boolean;
}

/**
 * Find or create a contact from denormalized fields on another record.
 * Failures are logged and yield undefined so the caller can skip instead.
 */
async function synthesizeContact(
  ctx: StageContext,
  entity: Extract<EntityKind, 'customer' | 'vendor'>,
  sourceId: number | null | undefined,
  request: ContactCreateRequest,
  context: string
): Promise<SynthesizedContact | undefined> {
  const index = ctx.registry.index(entity);
  const name = request.contact_name;

  const register = (id: string): void => {
    if (sourceId !== null && sourceId !== undefined) {
      ctx.registry.register(entity, sourceId, id);
    }
  };

  const existingId = index.lookup(name);
  if (existingId) {
    register(existingId);
    ctx.print(`  [EXISTS] ${entity === 'customer' ? 'Customer' : 'Vendor'} '${name}' for ${context}`);
    return { id: existingId, created: false };
  }

  try {
    const outcome = await createOrReconcile({
      name,
      create: () => createContact(ctx.destination, request, `from-${context.replace(/\s+/g, '-')}`),
      refetch: contactsOf(ctx, request.contact_type),
    });
    register(outcome.id);
    index.add(name, outcome.id);

    const label = entity === 'customer' ? 'customer' : 'vendor';
    if (outcome.kind === 'placeholder') {
      ctx.print(`  [DRY RUN] Would create ${label} '${name}' from ${context}`);
    } else if (outcome.kind === 'created') {
      ctx.print(`  [CREATED] ${label} '${name}' from ${context}`);
    }
    return { id: outcome.id, created: outcome.kind !== 'existing' };
  } catch (error) {
    if (isFatalError(error)) {
      throw error;
    }
    const message = describeError(error);
    ctx.log.warn('Could not create contact from embedded fields', { entity, name, error: message });
    ctx.print(`  [WARNING] Could not create ${entity} from ${context}: ${message}`);
    return undefined;
  }
}

/**
 * Customer for an invoice whose client has no mapping (e.g. an archived client)
 */
export async function ensureInvoiceCustomer(
  ctx: StageContext,
  invoice: FreshBooksInvoice,
  invoiceLabel: string
): Promise<SynthesizedContact | undefined> {
  const request = mapCustomerFromInvoice(invoice);
  if (!request) {
    return undefined;
  }
  return synthesizeContact(ctx, 'customer', invoice.customerid, request, `invoice ${invoiceLabel}`);
}

/**
 * Vendor for an expense whose vendor id has no mapping but whose vendor name is set
 */
export async function ensureExpenseVendor(
  ctx: StageContext,
  expense: FreshBooksExpense
): Promise<SynthesizedContact | undefined> {
  const request = mapVendorFromExpense(expense);
  if (!request) {
    return undefined;
  }
  return synthesizeContact(ctx, 'vendor', expense.vendorid, request, `expense ${expense.id}`);
}
