import { DestinationApplicationError } from '../errors';
import { createLogger } from '../logging';
import { WriteResult } from '../zoho/http/client';
import { normalizeKey } from './id-registry';

const log = createLogger('migration');

export interface NamedRecord {
  id: string;
  name: string;
}

export interface ReconcileStep {
  /** Natural key the destination deduplicates on */
  name: string;
  create: () => Promise<WriteResult>;
  /** Re-list destination records when the create is rejected as a duplicate */
  refetch: () => Promise<NamedRecord[]>;
}

export type ReconcileOutcome =
  | { kind: 'created'; id: string }
  | { kind: 'placeholder'; id: string }
  | { kind: 'existing'; id: string };

/**
 * Try to create a record; when the destination answers with a duplicate
 * code, re-list and adopt the record whose name matches.
 *
 * Any other error, or a duplicate with no matching record, is rethrown.
 */
export async function createOrReconcile(step: ReconcileStep): Promise<ReconcileOutcome> {
  let duplicate: DestinationApplicationError;
  try {
    const written = await step.create();
    return { kind: written.dryRun ? 'placeholder' : 'created', id: written.id };
  } catch (error) {
    if (!(error instanceof DestinationApplicationError) || !error.isDuplicate()) {
      throw error;
    }
    duplicate = error;
  }

  log.info('Create rejected as duplicate, looking up existing record', {
    name: step.name,
    code: duplicate.code,
  });

  const wanted = normalizeKey(step.name);
  const match = (await step.refetch()).find(record => normalizeKey(record.name) === wanted);
  if (!match) {
    throw duplicate;
  }
  return { kind: 'existing', id: match.id };
}
