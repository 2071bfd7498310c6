/**
 * Auth types for the FreshBooks and Zoho OAuth 2.0 flows
 */

import { z } from 'zod';
import { Backend } from '../errors';

/**
 * Token endpoint response shared by both providers
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/**
 * OAuth error body. Zoho answers some failures with HTTP 200 and this shape.
 */
export const OAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

export interface OAuthClient {
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
}

export interface BackendCredentials extends OAuthClient, TokenPair {}

export interface TokensRefreshedEvent {
  backend: Backend;
  tokens: TokenPair;
}

export type TokensRefreshedListener = (event: TokensRefreshedEvent) => void | Promise<void>;

export interface RefreshTokenRequest {
  grant_type: 'refresh_token';
  client_id: string;
  client_secret: string;
  refresh_token: string;
}

export interface AuthorizationCodeRequest {
  grant_type: 'authorization_code';
  client_id: string;
  client_secret: string;
  code: string;
  redirect_uri: string;
}

export type TokenRequest = RefreshTokenRequest | AuthorizationCodeRequest;
