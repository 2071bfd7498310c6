import { Backend, TokenRefreshError } from '../errors';
import { FetchFn, readBody } from '../http/runtime';
import { createLogger } from '../logging';
import { OAuthErrorSchema, TokenRequest, TokenResponse, TokenResponseSchema } from './types';

const log = createLogger('auth');

/**
 * POST a grant to a token endpoint and validate the answer.
 *
 * FreshBooks takes a JSON body; Zoho takes form parameters.
 *
 * @throws {TokenRefreshError} on network failure, non-2xx, an OAuth error
 *   body, or a response without an access token
 */
export async function requestToken(
  fetchFn: FetchFn,
  backend: Backend,
  tokenUrl: string,
  request: TokenRequest
): Promise<TokenResponse> {
  const init: RequestInit =
    backend === 'source'
      ? {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify(request),
        }
      : {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
          body: new URLSearchParams({ ...request }).toString(),
        };

  log.debug('Requesting token', { backend, grantType: request.grant_type, url: tokenUrl });

  let response: Response;
  try {
    response = await fetchFn(tokenUrl, init);
  } catch (error) {
    throw new TokenRefreshError(backend, error instanceof Error ? error.message : String(error));
  }

  const { text, json } = await readBody(response);

  if (!response.ok) {
    const oauthError = OAuthErrorSchema.safeParse(json);
    const detail = oauthError.success
      ? oauthError.data.error_description ?? oauthError.data.error
      : text || response.statusText;
    log.error('Token endpoint returned an error', { backend, status: response.status, detail });
    throw new TokenRefreshError(backend, detail, response.status);
  }

  const parsed = TokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    const oauthError = OAuthErrorSchema.safeParse(json);
    const detail = oauthError.success ? oauthError.data.error : 'response did not contain an access token';
    log.error('Token endpoint returned an unusable body', { backend, detail });
    throw new TokenRefreshError(backend, detail, response.status);
  }

  return parsed.data;
}
