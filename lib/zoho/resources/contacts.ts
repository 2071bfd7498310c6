/**
 * Contact resource helpers (customers and vendors)
 * Endpoint: /contacts
 */

import { ZohoBooksClient, WriteResult } from '../http/client';
import { ContactCreateRequest, ContactSchema, ContactType, ZohoContact } from '../types';

/**
 * List contacts of one type
 * GET /contacts?contact_type={customer|vendor}
 */
export async function listContacts(client: ZohoBooksClient, contactType: ContactType): Promise<ZohoContact[]> {
  return client.listAll('/contacts', 'contacts', ContactSchema, { contact_type: contactType });
}

/**
 * Create a customer or vendor
 * POST /contacts
 */
export async function createContact(
  client: ZohoBooksClient,
  request: ContactCreateRequest,
  placeholderKey?: string | number
): Promise<WriteResult> {
  return client.write({
    method: 'POST',
    path: '/contacts',
    body: request,
    entity: request.contact_type,
    responseKey: 'contact',
    idField: 'contact_id',
    placeholderKey,
  });
}
