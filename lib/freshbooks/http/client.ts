import { TokenManager } from '../../auth/token-manager';
import { FRESHBOOKS_API_BASE } from '../../config';
import { AuthorizationError, SourceApiError } from '../../errors';
import { defaultFetch, FetchFn, readBody } from '../../http/runtime';
import { createLogger, generateCorrelationId, logApiRequest, logApiResponse } from '../../logging';

const log = createLogger('freshbooks');

export type SourceQuery = Record<string, string | number | undefined>;

export interface FreshBooksClientOptions {
  accountId: string;
  tokens: TokenManager;
  apiBase?: string;
  fetchFn?: FetchFn;
}

/**
 * FreshBooks accounting API client (read-only)
 *
 * Features:
 * - Bearer token read from the TokenManager on every request
 * - 401 → one source token refresh, then the same request again
 * - Network failures propagate to the caller
 */
export class FreshBooksClient {
  private readonly apiBase: string;
  private readonly accountId: string;
  private readonly tokens: TokenManager;
  private readonly fetchFn: FetchFn;

  constructor(options: FreshBooksClientOptions) {
    this.apiBase = (options.apiBase ?? FRESHBOOKS_API_BASE).replace(/\/+$/, '');
    this.accountId = options.accountId;
    this.tokens = options.tokens;
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  /**
   * Path of an accounting resource under the configured account
   */
  accountingPath(resource: string): string {
    return `/accounting/account/${encodeURIComponent(this.accountId)}/${resource}`;
  }

  /**
   * GET a resource and return the parsed JSON body
   *
   * @throws {AuthorizationError} when the request is still unauthorized after a refresh
   * @throws {SourceApiError} on any other non-2xx status
   */
  async get(path: string, query: SourceQuery = {}): Promise<unknown> {
    const url = this.buildUrl(path, query);
    const correlationId = generateCorrelationId('freshbooks');
    let refreshed = false;

    while (true) {
      const accessToken = await this.tokens.getAccessToken('source');

      logApiRequest(log, 'GET', url, correlationId);
      const startTime = Date.now();

      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
        },
      });

      logApiResponse(log, 'GET', url, response.status, correlationId, Date.now() - startTime);

      if (response.status === 401) {
        await response.text();
        if (refreshed) {
          throw new AuthorizationError('source');
        }
        log.info('Access token rejected, refreshing', { correlationId });
        refreshed = true;
        await this.tokens.refreshSourceToken();
        continue;
      }

      const { text, json } = await readBody(response);
      if (!response.ok) {
        log.error('FreshBooks request failed', { correlationId, status: response.status });
        throw new SourceApiError(response.status, text);
      }
      return json;
    }
  }

  private buildUrl(path: string, query: SourceQuery): string {
    const url = new URL(`${this.apiBase}${path}`);
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.append(name, String(value));
      }
    }
    return url.toString();
  }
}
