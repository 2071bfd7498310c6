import { describeError, isFatalError } from '../../errors';
import { WriteResult } from '../../zoho/http/client';
import { detail, StageContext } from '../context';
import { EntityKind } from '../id-registry';
import { createOrReconcile, NamedRecord, ReconcileOutcome } from '../reconcile';
import { MigrationResult } from '../result';

/**
 * Run a handler for each record, isolating failures to that record.
 * Fatal errors (dead credentials, registry conflicts) still abort the stage.
 */
export async function forEachRecord<T>(
  ctx: StageContext,
  records: readonly T[],
  result: MigrationResult,
  label: (record: T) => string,
  handle: (record: T) => Promise<void>
): Promise<void> {
  for (const record of records) {
    try {
      await handle(record);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      const message = describeError(error);
      result.recordFailure(label(record), message);
      ctx.log.warn('Record failed', { record: label(record), error: message });
      detail(ctx, `    Error: ${message}`);
    }
  }
}

/**
 * Seed a dedup index from destination records and report the count
 */
export function seedIndex(
  ctx: StageContext,
  entity: EntityKind,
  existing: readonly NamedRecord[],
  noun: string
): void {
  const index = ctx.registry.index(entity);
  for (const record of existing) {
    index.add(record.name, record.id);
  }
  ctx.print(`Found ${existing.length} existing ${noun} in Zoho Books`);
}

export interface NamedWrite {
  entity: EntityKind;
  /** Omitted for destination-only records such as configured parent accounts */
  sourceId?: number;
  name: string;
  create: () => Promise<WriteResult>;
  refetch: () => Promise<NamedRecord[]>;
}

export type DedupOutcome = ReconcileOutcome;

/**
 * Dedup by name, otherwise create (reconciling duplicates), then record the
 * mapping in the registry and the dedup index.
 */
export async function dedupOrCreate(
  ctx: StageContext,
  write: NamedWrite,
  result: MigrationResult
): Promise<DedupOutcome> {
  const index = ctx.registry.index(write.entity);
  const existingId = index.lookup(write.name);
  if (existingId) {
    if (write.sourceId !== undefined) {
      ctx.registry.register(write.entity, write.sourceId, existingId);
    }
    result.recordExisting();
    detail(ctx, `  [EXISTS] ${write.name}`);
    return { kind: 'existing', id: existingId };
  }

  detail(ctx, `  Creating ${write.entity}: ${write.name}`);
  const outcome = await createOrReconcile({ name: write.name, create: write.create, refetch: write.refetch });

  if (write.sourceId !== undefined) {
    ctx.registry.register(write.entity, write.sourceId, outcome.id);
  }
  index.add(write.name, outcome.id);

  if (outcome.kind === 'existing') {
    result.recordExisting();
    detail(ctx, `  [EXISTS] ${write.name} (found after create attempt)`);
  } else {
    result.recordSuccess();
    if (outcome.kind === 'placeholder') {
      detail(ctx, `  [DRY RUN] Would create ${write.entity}: ${write.name}`);
    }
  }
  return outcome;
}
