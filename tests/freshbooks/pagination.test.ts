import { describe, it, expect, beforeEach } from '@jest/globals';
import { createTokenManager } from '@/lib/auth/token-manager';
import { AuthorizationError, ResponseFormatError, SourceApiError } from '@/lib/errors';
import { FreshBooksClient } from '@/lib/freshbooks/http/client';
import { fetchAll } from '@/lib/freshbooks/pagination';
import { CLIENTS, FreshBooksReader } from '@/lib/freshbooks/resources';
import { FakeFreshBooks, FRESHBOOKS_HOST } from '../helpers/fake-freshbooks';
import { testConfig } from '../helpers/fixtures';
import { FakeFetch, jsonResponse } from '../helpers/http';

describe('FreshBooks pagination', () => {
  let freshbooks: FakeFreshBooks;
  let http: FakeFetch;
  let reader: FreshBooksReader;
  let client: FreshBooksClient;

  const listingRequests = () =>
    http.requests.filter(request => request.url.pathname.startsWith('/accounting/'));

  beforeEach(() => {
    freshbooks = new FakeFreshBooks();
    http = new FakeFetch(freshbooks.api, freshbooks.tokenEndpoint);
    client = new FreshBooksClient({
      accountId: 'acct-fb',
      tokens: createTokenManager(testConfig(), http.fetch),
      fetchFn: http.fetch,
    });
    reader = new FreshBooksReader(client);

    for (let id = 1; id <= 250; id += 1) {
      freshbooks.data.clients.push({ id, organization: `Client ${id}`, vis_state: 0 });
    }
  });

  it('reads every page at a page size of 100', async () => {
    const clients = await reader.fetchClients();

    expect(clients).toHaveLength(250);
    expect(clients[0].organization).toBe('Client 1');
    expect(clients[249].organization).toBe('Client 250');
    expect(listingRequests().map(request => request.url.searchParams.get('page'))).toEqual(['1', '2', '3']);
    expect(listingRequests().map(request => request.url.searchParams.get('per_page'))).toEqual([
      '100',
      '100',
      '100',
    ]);
  });

  it('sends the bearer token to the account-scoped path', async () => {
    await reader.fetchClients();

    const [first] = listingRequests();
    expect(first.url.pathname).toBe('/accounting/account/acct-fb/users/clients');
    expect(first.headers.get('authorization')).toBe('Bearer fb-access-0');
  });

  it('refreshes the token mid-listing and resumes at the same page', async () => {
    let rotated = false;
    http.use(request => {
      if (request.url.searchParams.get('page') === '2' && !rotated) {
        rotated = true;
        freshbooks.validToken = 'fb-access-1';
      }
      return undefined;
    });

    const clients = await reader.fetchClients();

    expect(clients).toHaveLength(250);
    expect(listingRequests().map(request => request.url.searchParams.get('page'))).toEqual(['1', '2', '2', '3']);
    expect(http.requests.filter(request => request.url.pathname === '/auth/oauth/token')).toHaveLength(1);
  });

  it('raises AuthorizationError when the refreshed token is rejected too', async () => {
    http.use(request =>
      request.url.pathname.startsWith('/accounting/') ? jsonResponse(401, { error: 'unauthenticated' }) : undefined
    );

    const error = await reader.fetchClients().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthorizationError);
    if (error instanceof AuthorizationError) {
      expect(error.backend).toBe('source');
    }
    expect(listingRequests()).toHaveLength(2);
    expect(http.requests.filter(request => request.url.pathname === '/auth/oauth/token')).toHaveLength(1);
  });

  it('returns archived records too', async () => {
    freshbooks.data.clients.splice(0, freshbooks.data.clients.length, { id: 1, vis_state: 0 }, { id: 2, vis_state: 1 });

    const clients = await reader.fetchClients();

    expect(clients.map(record => record.vis_state)).toEqual([0, 1]);
  });

  it('asks for invoice lines', async () => {
    await reader.fetchInvoices();

    expect(listingRequests()[0].url.searchParams.get('include[]')).toBe('lines');
  });

  it('rejects a body that is not a listing', async () => {
    http.use(request => (request.url.host === FRESHBOOKS_HOST ? jsonResponse(200, { response: {} }) : undefined));

    await expect(fetchAll(client, CLIENTS)).rejects.toBeInstanceOf(ResponseFormatError);
  });

  it('raises SourceApiError for other failures', async () => {
    http.use(request => (request.url.host === FRESHBOOKS_HOST ? jsonResponse(503, { error: 'maintenance' }) : undefined));

    const error = await reader.fetchClients().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceApiError);
    if (error instanceof SourceApiError) {
      expect(error.statusCode).toBe(503);
    }
  });
});
