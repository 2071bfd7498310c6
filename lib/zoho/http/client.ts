import { z } from 'zod';
import { TokenManager } from '../../auth/token-manager';
import {
  AuthorizationError,
  DestinationApiError,
  DestinationApplicationError,
  ResponseFormatError,
} from '../../errors';
import { defaultFetch, defaultSleep, FetchFn, readBody, Sleep } from '../../http/runtime';
import { createLogger, generateCorrelationId, logApiRequest, logApiResponse } from '../../logging';
import { EnvelopeSchema, PageContextSchema } from '../types';
import { RateWindow, RATE_WINDOW_MS } from './rate-window';

const log = createLogger('zoho');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface GatewayRequest {
  method?: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
}

export interface WriteRequest extends GatewayRequest {
  /** Short entity name used in placeholder ids and logs, e.g. "customer" */
  entity: string;
  /** Envelope key holding the created record, e.g. "contact" */
  responseKey: string;
  /** Field of the created record holding its id, e.g. "contact_id" */
  idField: string;
  /** Source-side key appended to the dry-run placeholder id */
  placeholderKey?: string | number;
}

export interface WriteResult {
  id: string;
  record: Record<string, unknown> | null;
  dryRun: boolean;
}

export interface ZohoBooksClientOptions {
  apiBase: string;
  organizationId: string;
  tokens: TokenManager;
  rateWindow?: RateWindow;
  fetchFn?: FetchFn;
  sleep?: Sleep;
  dryRun?: boolean;
  /** Fixed wait after a 429 before the same request is retried */
  throttleBackoffMs?: number;
  pageSize?: number;
}

export const DEFAULT_LIST_PAGE_SIZE = 200;

/**
 * Zoho Books API gateway
 *
 * Features:
 * - Sliding-window admission (100 requests per rolling minute)
 * - organization_id appended to every call
 * - 401 → one destination token refresh and one retry
 * - 429 → fixed 60s wait and retry, repeated for as long as Zoho throttles
 * - Envelope unwrapping with typed application errors
 * - Dry-run short-circuit of every write
 */
export class ZohoBooksClient {
  private readonly apiBase: string;
  private readonly organizationId: string;
  private readonly tokens: TokenManager;
  private readonly rateWindow: RateWindow;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly throttleBackoffMs: number;
  private readonly pageSize: number;
  private placeholderSeq = 0;
  readonly dryRun: boolean;

  constructor(options: ZohoBooksClientOptions) {
    this.apiBase = options.apiBase.replace(/\/+$/, '');
    this.organizationId = options.organizationId;
    this.tokens = options.tokens;
    this.rateWindow = options.rateWindow ?? new RateWindow();
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.dryRun = options.dryRun ?? false;
    this.throttleBackoffMs = options.throttleBackoffMs ?? RATE_WINDOW_MS;
    this.pageSize = options.pageSize ?? DEFAULT_LIST_PAGE_SIZE;
  }

  /**
   * Issue one request and return the parsed JSON body.
   *
   * In dry-run mode non-GET requests return null without touching the
   * network or the rate window.
   *
   * @throws {AuthorizationError} when a retried request is still unauthorized
   * @throws {DestinationApplicationError} on a 4xx carrying a Zoho error code
   * @throws {DestinationApiError} on any other non-2xx status
   */
  async execute(request: GatewayRequest): Promise<unknown> {
    const method = request.method ?? 'GET';

    if (this.dryRun && method !== 'GET') {
      log.info('Dry run: skipped write', { method, path: request.path });
      return null;
    }

    const url = this.buildUrl(request.path, request.query);
    const correlationId = generateCorrelationId('zoho');
    let refreshed = false;

    while (true) {
      await this.rateWindow.acquire();
      const accessToken = await this.tokens.getAccessToken('destination');

      logApiRequest(log, method, url, correlationId);
      const startTime = Date.now();

      const response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: `Zoho-oauthtoken ${accessToken}`,
          Accept: 'application/json',
          ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
      });

      logApiResponse(log, method, url, response.status, correlationId, Date.now() - startTime);

      if (response.status === 401) {
        await response.text();
        if (refreshed) {
          throw new AuthorizationError('destination');
        }
        log.info('Access token rejected, refreshing', { correlationId });
        refreshed = true;
        await this.tokens.refreshDestinationToken();
        continue;
      }

      if (response.status === 429) {
        await response.text();
        log.warn('Throttled by Zoho Books, waiting before retry', {
          correlationId,
          waitMs: this.throttleBackoffMs,
        });
        await this.sleep(this.throttleBackoffMs);
        continue;
      }

      const { text, json } = await readBody(response);

      if (!response.ok) {
        log.error('Zoho Books request failed', { correlationId, method, status: response.status });
        // Validation and duplicate rejections arrive as 4xx with an envelope code
        const envelope = EnvelopeSchema.safeParse(json);
        if (response.status < 500 && envelope.success && envelope.data.code !== 0) {
          throw new DestinationApplicationError(envelope.data.code, envelope.data.message ?? '');
        }
        throw new DestinationApiError(response.status, text);
      }

      return json;
    }
  }

  /**
   * Create or update a record and return its id.
   *
   * Dry-run returns a placeholder id so dependent stages can still map.
   *
   * @throws {DestinationApplicationError} when the envelope code is non-zero
   */
  async write(request: WriteRequest): Promise<WriteResult> {
    if (this.dryRun) {
      this.placeholderSeq += 1;
      const suffix = request.placeholderKey ?? this.placeholderSeq;
      const id = `dry-run-${request.entity}-${String(suffix).replace(/\s+/g, '-')}`;
      log.info('Dry run: would write', { entity: request.entity, method: request.method ?? 'POST', id });
      return { id, record: null, dryRun: true };
    }

    const envelope = this.unwrap(
      await this.execute({
        method: request.method ?? 'POST',
        path: request.path,
        query: request.query,
        body: request.body,
      }),
      request.path
    );
    const record = envelope[request.responseKey];

    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      throw new ResponseFormatError(request.path, [`missing "${request.responseKey}" object`]);
    }

    const fields = Object.fromEntries(Object.entries(record));
    const rawId = fields[request.idField];
    if (typeof rawId !== 'string' && typeof rawId !== 'number') {
      throw new ResponseFormatError(request.path, [`missing "${request.responseKey}.${request.idField}"`]);
    }

    return { id: String(rawId), record: fields, dryRun: false };
  }

  /**
   * Fire a state-change call such as marking an invoice sent.
   * Only the envelope code is checked.
   */
  async action(request: GatewayRequest): Promise<void> {
    const json = await this.execute({ ...request, method: request.method ?? 'POST' });
    if (this.dryRun) {
      return;
    }
    this.unwrap(json, request.path);
  }

  /**
   * List every record of a collection, following page_context.has_more_page
   */
  async listAll<T>(
    path: string,
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    query: QueryParams = {}
  ): Promise<T[]> {
    const records: T[] = [];
    let page = 1;

    while (true) {
      const envelope = this.unwrap(
        await this.execute({ path, query: { ...query, page, per_page: this.pageSize } }),
        path
      );

      const items = z.array(schema).safeParse(envelope[key] ?? []);
      if (!items.success) {
        throw new ResponseFormatError(
          path,
          items.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
      }
      records.push(...items.data);

      const pageContext = PageContextSchema.safeParse(envelope.page_context);
      const hasMore = pageContext.success && pageContext.data.has_more_page === true;
      log.debug('Listed page', { path, page, count: items.data.length, hasMore });

      if (!hasMore) {
        return records;
      }
      page += 1;
    }
  }

  buildUrl(path: string, query: QueryParams = {}): string {
    const url = new URL(`${this.apiBase}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.append(name, String(value));
      }
    }
    url.searchParams.set('organization_id', this.organizationId);
    return url.toString();
  }

  private unwrap(json: unknown, context: string): z.infer<typeof EnvelopeSchema> {
    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ResponseFormatError(context, ['response is not a Zoho Books envelope']);
    }
    if (envelope.data.code !== 0) {
      throw new DestinationApplicationError(envelope.data.code, envelope.data.message ?? '');
    }
    return envelope.data;
  }
}
