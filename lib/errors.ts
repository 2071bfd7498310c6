/**
 * Custom error types for the FreshBooks → Zoho Books migration
 */

export type Backend = 'source' | 'destination';

/**
 * Application error codes Zoho Books returns when a record with the same
 * name or code already exists.
 */
export const DUPLICATE_ERROR_CODES: readonly number[] = [1001, 3062, 11002];

/**
 * Destination returned a non-2xx status other than 401/429
 */
export class DestinationApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(`Zoho Books request failed with HTTP ${statusCode}`);
    this.name = 'DestinationApiError';
    Object.setPrototypeOf(this, DestinationApiError.prototype);
  }

  toHumanReadable(): string {
    const parts = [this.message];
    if (this.body) {
      parts.push(`Body: ${this.body.slice(0, 300)}`);
    }
    return parts.join(' | ');
  }
}

/**
 * Destination envelope carried a non-zero code (on a 2xx or a 4xx)
 */
export class DestinationApplicationError extends Error {
  constructor(
    public readonly code: number,
    public readonly apiMessage: string
  ) {
    super(`Zoho Books error ${code}: ${apiMessage}`);
    this.name = 'DestinationApplicationError';
    Object.setPrototypeOf(this, DestinationApplicationError.prototype);
  }

  /**
   * True when the destination rejected the write because the record exists
   */
  isDuplicate(): boolean {
    return DUPLICATE_ERROR_CODES.includes(this.code) || /already exists/i.test(this.apiMessage);
  }

  toHumanReadable(): string {
    return `${this.apiMessage} (code ${this.code})`;
  }
}

/**
 * Source returned a non-2xx status other than 401
 */
export class SourceApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(`FreshBooks request failed with HTTP ${statusCode}`);
    this.name = 'SourceApiError';
    Object.setPrototypeOf(this, SourceApiError.prototype);
  }

  toHumanReadable(): string {
    return this.body ? `${this.message} | Body: ${this.body.slice(0, 300)}` : this.message;
  }
}

/**
 * Request still unauthorized after a successful token refresh
 */
export class AuthorizationError extends Error {
  constructor(public readonly backend: Backend) {
    super(`${backend === 'source' ? 'FreshBooks' : 'Zoho Books'} rejected the refreshed access token`);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Token endpoint exchange failed. Not retried.
 */
export class TokenRefreshError extends Error {
  constructor(
    public readonly backend: Backend,
    public readonly detail: string,
    public readonly statusCode?: number
  ) {
    super(`OAuth token exchange failed for ${backend === 'source' ? 'FreshBooks' : 'Zoho Books'}: ${detail}`);
    this.name = 'TokenRefreshError';
    Object.setPrototypeOf(this, TokenRefreshError.prototype);
  }

  toHumanReadable(): string {
    const parts = [this.message];
    if (this.statusCode !== undefined) {
      parts.push(`Status: ${this.statusCode}`);
    }
    parts.push('Re-authorize with `books-migrate auth`');
    return parts.join(' | ');
  }
}

/**
 * A response body did not match the expected shape
 */
export class ResponseFormatError extends Error {
  constructor(
    public readonly context: string,
    public readonly issues: string[]
  ) {
    super(`Unexpected response format from ${context}: ${issues.join('; ')}`);
    this.name = 'ResponseFormatError';
    Object.setPrototypeOf(this, ResponseFormatError.prototype);
  }
}

/**
 * A registry key was written twice with different destination ids
 */
export class RegistryConflictError extends Error {
  constructor(
    public readonly entity: string,
    public readonly sourceId: number,
    public readonly existing: string,
    public readonly attempted: string
  ) {
    super(`${entity} ${sourceId} is already mapped to ${existing}, refusing to remap to ${attempted}`);
    this.name = 'RegistryConflictError';
    Object.setPrototypeOf(this, RegistryConflictError.prototype);
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Errors that abort a stage instead of failing a single record
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof TokenRefreshError ||
    error instanceof AuthorizationError ||
    error instanceof RegistryConflictError
  );
}

/**
 * Message recorded in a stage result for a failed record
 */
export function describeError(error: unknown): string {
  if (
    error instanceof DestinationApiError ||
    error instanceof DestinationApplicationError ||
    error instanceof SourceApiError ||
    error instanceof TokenRefreshError
  ) {
    return error.toHumanReadable();
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
