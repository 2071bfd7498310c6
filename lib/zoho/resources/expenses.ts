/**
 * Expense resource helpers
 * Endpoint: /expenses
 */

import { ZohoBooksClient, WriteResult } from '../http/client';
import { ExpenseCreateRequest, ExpenseSchema, ZohoExpense } from '../types';

export async function listExpenses(client: ZohoBooksClient): Promise<ZohoExpense[]> {
  return client.listAll('/expenses', 'expenses', ExpenseSchema);
}

export async function createExpense(
  client: ZohoBooksClient,
  request: ExpenseCreateRequest,
  placeholderKey?: string | number
): Promise<WriteResult> {
  return client.write({
    method: 'POST',
    path: '/expenses',
    body: request,
    entity: 'expense',
    responseKey: 'expense',
    idField: 'expense_id',
    placeholderKey,
  });
}
