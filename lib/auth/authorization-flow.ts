/**
 * Authorization code flow, used once to obtain the first token pair
 */

import {
  AppConfig,
  FRESHBOOKS_AUTH_BASE,
  zohoAuthorizeUrl,
} from '../config';
import { Backend } from '../errors';
import { defaultFetch, FetchFn } from '../http/runtime';
import { createLogger } from '../logging';
import { requestToken } from './token-exchange';
import { credentialsFor } from './token-manager';
import { TokenPair } from './types';

const log = createLogger('auth');

export const ZOHO_BOOKS_SCOPE = 'ZohoBooks.fullaccess.all';

/**
 * URL the user opens to approve access
 */
export function getAuthorizationUrl(config: AppConfig, backend: Backend, redirectUri: string): string {
  if (backend === 'source') {
    const params = new URLSearchParams({
      client_id: config.freshbooks.clientId,
      response_type: 'code',
      redirect_uri: redirectUri,
    });
    return `${FRESHBOOKS_AUTH_BASE}/oauth/authorize?${params.toString()}`;
  }

  const params = new URLSearchParams({
    scope: ZOHO_BOOKS_SCOPE,
    client_id: config.zoho.clientId,
    response_type: 'code',
    access_type: 'offline',
    prompt: 'consent',
    redirect_uri: redirectUri,
  });
  return `${zohoAuthorizeUrl(config.zoho.region)}?${params.toString()}`;
}

/**
 * Exchange an authorization code for an access/refresh token pair
 */
export async function exchangeCodeForToken(
  config: AppConfig,
  backend: Backend,
  code: string,
  redirectUri: string,
  fetchFn: FetchFn = defaultFetch
): Promise<TokenPair> {
  const client = credentialsFor(config, backend);

  log.info('Exchanging authorization code for token', { backend, redirectUri });

  const response = await requestToken(fetchFn, backend, client.tokenUrl, {
    grant_type: 'authorization_code',
    client_id: client.clientId,
    client_secret: client.clientSecret,
    code,
    redirect_uri: redirectUri,
  });

  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token ?? '',
  };
}
