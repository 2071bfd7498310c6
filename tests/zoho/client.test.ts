import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { createTokenManager, TokenManager } from '@/lib/auth/token-manager';
import { zohoApiBase } from '@/lib/config';
import {
  AuthorizationError,
  DestinationApiError,
  DestinationApplicationError,
} from '@/lib/errors';
import { ZohoBooksClient } from '@/lib/zoho/http/client';
import { RateWindow } from '@/lib/zoho/http/rate-window';
import { createAccount, listAccounts } from '@/lib/zoho/resources/accounts';
import { markInvoiceSent } from '@/lib/zoho/resources/invoices';
import { AccountSchema } from '@/lib/zoho/types';
import { FakeZohoBooks, ZOHO_ACCOUNTS_HOST, ZOHO_HOST } from '../helpers/fake-zoho';
import { testConfig } from '../helpers/fixtures';
import { FakeFetch, jsonResponse } from '../helpers/http';

describe('ZohoBooksClient', () => {
  let zoho: FakeZohoBooks;
  let http: FakeFetch;
  let tokens: TokenManager;
  let sleep: jest.Mock<(ms: number) => Promise<void>>;

  const createClient = (dryRun = false) =>
    new ZohoBooksClient({
      apiBase: zohoApiBase('com'),
      organizationId: 'org-1',
      tokens,
      rateWindow: new RateWindow({ clock: () => 0, sleep }),
      fetchFn: http.fetch,
      sleep,
      dryRun,
    });

  beforeEach(() => {
    zoho = new FakeZohoBooks();
    http = new FakeFetch(zoho.api, zoho.tokenEndpoint);
    tokens = createTokenManager(testConfig(), http.fetch);
    sleep = jest.fn<(ms: number) => Promise<void>>(async () => undefined);
  });

  describe('buildUrl', () => {
    it('appends organization_id and keeps caller parameters', () => {
      expect(createClient().buildUrl('/contacts', { contact_type: 'customer', page: 2 })).toBe(
        'https://www.zohoapis.com/books/v3/contacts?contact_type=customer&page=2&organization_id=org-1'
      );
    });
  });

  describe('authorization', () => {
    it('refreshes the destination token once on 401 and retries the request', async () => {
      zoho.seed('/chartofaccounts', { account_name: 'Rent', account_type: 'expense' });
      zoho.validToken = 'zoho-access-1';

      const accounts = await listAccounts(createClient());

      expect(accounts.map(account => account.account_name)).toEqual(['Rent']);
      expect(http.requests.map(request => `${request.method} ${request.url.host}`)).toEqual([
        `GET ${ZOHO_HOST}`,
        `POST ${ZOHO_ACCOUNTS_HOST}`,
        `GET ${ZOHO_HOST}`,
      ]);
      expect(http.requests[2].headers.get('authorization')).toBe('Zoho-oauthtoken zoho-access-1');
      expect(tokens.getTokens('destination')).toEqual({
        accessToken: 'zoho-access-1',
        refreshToken: 'zoho-refresh-0',
      });
    });

    it('throws AuthorizationError when the retried request is still unauthorized', async () => {
      http.use(request =>
        request.url.host === ZOHO_HOST ? jsonResponse(401, { code: 57, message: 'Not authorized' }) : undefined
      );

      await expect(listAccounts(createClient())).rejects.toBeInstanceOf(AuthorizationError);
      expect(http.requestsTo(ZOHO_ACCOUNTS_HOST)).toHaveLength(1);
      expect(http.requestsTo(ZOHO_HOST)).toHaveLength(2);
    });
  });

  describe('throttling', () => {
    it('waits the fixed backoff after a 429 and sends the request again', async () => {
      let throttled = false;
      http.use(request => {
        if (request.url.host === ZOHO_HOST && !throttled) {
          throttled = true;
          return jsonResponse(429, { code: 44, message: 'Too many requests' });
        }
        return undefined;
      });

      await expect(listAccounts(createClient())).resolves.toEqual([]);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(60_000);
      expect(http.requestsTo(ZOHO_HOST)).toHaveLength(2);
    });
  });

  describe('errors', () => {
    it('raises a duplicate application error for a 400 carrying a Zoho code', async () => {
      zoho.seed('/chartofaccounts', { account_name: 'Rent', account_type: 'expense' });

      const error = await createAccount(createClient(), { account_name: 'Rent', account_type: 'expense' }).catch(
        (caught: unknown) => caught
      );

      expect(error).toBeInstanceOf(DestinationApplicationError);
      if (error instanceof DestinationApplicationError) {
        expect(error.code).toBe(11002);
        expect(error.isDuplicate()).toBe(true);
      }
    });

    it('raises DestinationApiError for a server error', async () => {
      http.use(request => (request.url.host === ZOHO_HOST ? new Response('upstream down', { status: 502 }) : undefined));

      const error = await listAccounts(createClient()).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DestinationApiError);
      if (error instanceof DestinationApiError) {
        expect(error.statusCode).toBe(502);
        expect(error.toHumanReadable()).toBe('Zoho Books request failed with HTTP 502 | Body: upstream down');
      }
    });
  });

  describe('write', () => {
    it('returns the id of the created record', async () => {
      const written = await createAccount(createClient(), { account_name: 'Software', account_type: 'expense' });

      expect(written.id).toBe('acct-1');
      expect(written.dryRun).toBe(false);
      expect(http.requests[0].body).toEqual({ account_name: 'Software', account_type: 'expense' });
    });

    it('returns placeholder ids in dry-run mode without sending anything', async () => {
      const client = createClient(true);

      const first = await createAccount(client, { account_name: 'Office Supplies', account_type: 'expense' });
      const second = await createAccount(client, { account_name: 'Travel', account_type: 'expense' });

      expect(first).toEqual({ id: 'dry-run-account-1', record: null, dryRun: true });
      expect(second).toEqual({ id: 'dry-run-account-2', record: null, dryRun: true });
      expect(http.requests).toHaveLength(0);
    });

    it('uses the placeholder key in dry-run ids', async () => {
      const written = await createAccount(
        createClient(true),
        { account_name: 'Office Supplies', account_type: 'expense' },
        'Office Supplies'
      );

      expect(written.id).toBe('dry-run-account-Office-Supplies');
    });

    it('skips state-change actions in dry-run mode', async () => {
      await markInvoiceSent(createClient(true), 'inv-1');

      expect(http.requests).toHaveLength(0);
    });
  });

  describe('listAll', () => {
    it('follows page_context until has_more_page is false', async () => {
      http.use(request => {
        if (request.url.host !== ZOHO_HOST) {
          return undefined;
        }
        const page = request.url.searchParams.get('page');
        return jsonResponse(200, {
          code: 0,
          chart_of_accounts: [{ account_id: Number(page), account_name: `Account ${page}` }],
          page_context: { page: Number(page), has_more_page: page === '1' },
        });
      });

      const accounts = await createClient().listAll('/chartofaccounts', 'chart_of_accounts', AccountSchema);

      expect(accounts.map(account => account.account_id)).toEqual(['1', '2']);
      expect(http.requests.map(request => request.url.searchParams.get('per_page'))).toEqual(['200', '200']);
    });
  });
});
