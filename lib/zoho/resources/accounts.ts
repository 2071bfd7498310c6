/**
 * Chart of accounts resource helpers
 * Endpoint: /chartofaccounts
 */

import { ZohoBooksClient, WriteResult } from '../http/client';
import { AccountCreateRequest, AccountSchema, AccountUpdateRequest, ZohoAccount } from '../types';

/**
 * List every account in the organization
 * GET /chartofaccounts
 */
export async function listAccounts(client: ZohoBooksClient): Promise<ZohoAccount[]> {
  return client.listAll('/chartofaccounts', 'chart_of_accounts', AccountSchema);
}

/**
 * Create an account
 * POST /chartofaccounts
 */
export async function createAccount(
  client: ZohoBooksClient,
  request: AccountCreateRequest,
  placeholderKey?: string | number
): Promise<WriteResult> {
  return client.write({
    method: 'POST',
    path: '/chartofaccounts',
    body: request,
    entity: 'account',
    responseKey: 'chart_of_account',
    idField: 'account_id',
    placeholderKey,
  });
}

/**
 * Re-parent an existing account
 * PUT /chartofaccounts/{account_id}
 */
export async function updateAccount(
  client: ZohoBooksClient,
  accountId: string,
  request: AccountUpdateRequest
): Promise<WriteResult> {
  return client.write({
    method: 'PUT',
    path: `/chartofaccounts/${encodeURIComponent(accountId)}`,
    body: request,
    entity: 'account',
    responseKey: 'chart_of_account',
    idField: 'account_id',
    placeholderKey: accountId,
  });
}
