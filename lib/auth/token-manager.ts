import { AppConfig, FRESHBOOKS_API_BASE, zohoTokenUrl } from '../config';
import { Backend } from '../errors';
import { defaultFetch, FetchFn } from '../http/runtime';
import { createLogger } from '../logging';
import { requestToken } from './token-exchange';
import { BackendCredentials, OAuthClient, TokenPair, TokensRefreshedListener } from './types';

const log = createLogger('auth');

export interface TokenManagerOptions {
  source: BackendCredentials;
  destination: BackendCredentials;
  fetchFn?: FetchFn;
}

/**
 * TokenManager owns the access/refresh token pair of each backend.
 *
 * - Tokens are read on every request, so a refresh is visible to the next call
 * - Concurrent refreshes of one backend share a single token exchange
 * - A failed exchange is fatal and never retried here
 * - Persistence is left to listeners registered with onTokensRefreshed
 */
export class TokenManager {
  private readonly clients: Record<Backend, OAuthClient>;
  private readonly tokens: Record<Backend, TokenPair>;
  private readonly refreshLocks = new Map<Backend, Promise<string>>();
  private readonly listeners = new Set<TokensRefreshedListener>();
  private readonly fetchFn: FetchFn;

  constructor(options: TokenManagerOptions) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.clients = {
      source: pickClient(options.source),
      destination: pickClient(options.destination),
    };
    this.tokens = {
      source: { accessToken: options.source.accessToken, refreshToken: options.source.refreshToken },
      destination: {
        accessToken: options.destination.accessToken,
        refreshToken: options.destination.refreshToken,
      },
    };
  }

  /**
   * Current access token, waiting for an in-flight refresh of the same backend
   */
  async getAccessToken(backend: Backend): Promise<string> {
    const lock = this.refreshLocks.get(backend);
    if (lock) {
      return lock;
    }
    return this.tokens[backend].accessToken;
  }

  getTokens(backend: Backend): TokenPair {
    return { ...this.tokens[backend] };
  }

  refreshSourceToken(): Promise<string> {
    return this.refresh('source');
  }

  refreshDestinationToken(): Promise<string> {
    return this.refresh('destination');
  }

  refresh(backend: Backend): Promise<string> {
    const existing = this.refreshLocks.get(backend);
    if (existing) {
      log.debug('Refresh already in progress, waiting', { backend });
      return existing;
    }

    const lock = this.performRefresh(backend).finally(() => {
      this.refreshLocks.delete(backend);
    });
    this.refreshLocks.set(backend, lock);
    return lock;
  }

  /**
   * Subscribe to successful refreshes. Returns an unsubscribe function.
   */
  onTokensRefreshed(listener: TokensRefreshedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async performRefresh(backend: Backend): Promise<string> {
    const client = this.clients[backend];
    const current = this.tokens[backend];

    log.info('Refreshing access token', { backend });

    const response = await requestToken(this.fetchFn, backend, client.tokenUrl, {
      grant_type: 'refresh_token',
      client_id: client.clientId,
      client_secret: client.clientSecret,
      refresh_token: current.refreshToken,
    });

    // Access and refresh token are replaced together; providers that do not
    // rotate refresh tokens omit the field.
    const next: TokenPair = {
      accessToken: response.access_token,
      refreshToken: response.refresh_token ?? current.refreshToken,
    };
    this.tokens[backend] = next;

    log.info('Access token refreshed', { backend, expiresIn: response.expires_in });

    for (const listener of this.listeners) {
      try {
        await listener({ backend, tokens: { ...next } });
      } catch (error) {
        log.warn('Token refresh listener failed', {
          backend,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return next.accessToken;
  }
}

/**
 * OAuth client and current tokens of one backend, as configured
 */
export function credentialsFor(config: AppConfig, backend: Backend): BackendCredentials {
  if (backend === 'source') {
    return {
      clientId: config.freshbooks.clientId,
      clientSecret: config.freshbooks.clientSecret,
      tokenUrl: `${FRESHBOOKS_API_BASE}/auth/oauth/token`,
      accessToken: config.freshbooks.accessToken,
      refreshToken: config.freshbooks.refreshToken,
    };
  }
  return {
    clientId: config.zoho.clientId,
    clientSecret: config.zoho.clientSecret,
    tokenUrl: zohoTokenUrl(config.zoho.region),
    accessToken: config.zoho.accessToken,
    refreshToken: config.zoho.refreshToken,
  };
}

export function createTokenManager(config: AppConfig, fetchFn?: FetchFn): TokenManager {
  return new TokenManager({
    source: credentialsFor(config, 'source'),
    destination: credentialsFor(config, 'destination'),
    fetchFn,
  });
}

function pickClient(credentials: BackendCredentials): OAuthClient {
  return {
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    tokenUrl: credentials.tokenUrl,
  };
}
