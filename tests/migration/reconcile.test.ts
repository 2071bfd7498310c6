import { describe, it, expect, jest } from '@jest/globals';
import { DestinationApiError, DestinationApplicationError } from '@/lib/errors';
import { createOrReconcile, NamedRecord } from '@/lib/migration/reconcile';
import { WriteResult } from '@/lib/zoho/http/client';

describe('createOrReconcile', () => {
  const refetchReturning = (records: NamedRecord[]) =>
    jest.fn<() => Promise<NamedRecord[]>>(async () => records);

  it('returns the created id without listing', async () => {
    const refetch = refetchReturning([]);

    const outcome = await createOrReconcile({
      name: 'Acme',
      create: async (): Promise<WriteResult> => ({ id: 'c-9', record: {}, dryRun: false }),
      refetch,
    });

    expect(outcome).toEqual({ kind: 'created', id: 'c-9' });
    expect(refetch).not.toHaveBeenCalled();
  });

  it('reports dry-run writes as placeholders', async () => {
    const outcome = await createOrReconcile({
      name: 'Acme',
      create: async (): Promise<WriteResult> => ({ id: 'dry-run-customer-1', record: null, dryRun: true }),
      refetch: refetchReturning([]),
    });

    expect(outcome).toEqual({ kind: 'placeholder', id: 'dry-run-customer-1' });
  });

  it('adopts the matching record after a duplicate rejection', async () => {
    const outcome = await createOrReconcile({
      name: 'Acme  Corp',
      create: async () => {
        throw new DestinationApplicationError(3062, 'Contact already exists');
      },
      refetch: refetchReturning([
        { id: 'c-1', name: 'Globex' },
        { id: 'c-2', name: 'acme corp' },
      ]),
    });

    expect(outcome).toEqual({ kind: 'existing', id: 'c-2' });
  });

  it('rethrows the duplicate when nothing matches', async () => {
    const duplicate = new DestinationApplicationError(1001, 'already exists');

    await expect(
      createOrReconcile({
        name: 'Acme',
        create: async () => {
          throw duplicate;
        },
        refetch: refetchReturning([{ id: 'c-1', name: 'Globex' }]),
      })
    ).rejects.toBe(duplicate);
  });

  it('rethrows other errors without listing', async () => {
    const refetch = refetchReturning([]);

    await expect(
      createOrReconcile({
        name: 'Acme',
        create: async () => {
          throw new DestinationApiError(400, 'bad');
        },
        refetch,
      })
    ).rejects.toBeInstanceOf(DestinationApiError);
    expect(refetch).not.toHaveBeenCalled();
  });
});
