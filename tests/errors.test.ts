import { describe, it, expect } from '@jest/globals';
import {
  AuthorizationError,
  ConfigError,
  describeError,
  DestinationApiError,
  DestinationApplicationError,
  isFatalError,
  RegistryConflictError,
  SourceApiError,
  TokenRefreshError,
} from '@/lib/errors';

describe('DestinationApplicationError', () => {
  it.each([1001, 3062, 11002])('treats code %d as a duplicate', code => {
    expect(new DestinationApplicationError(code, 'Rejected').isDuplicate()).toBe(true);
  });

  it('recognizes duplicates by message', () => {
    expect(new DestinationApplicationError(4000, 'Contact "Acme" already exists.').isDuplicate()).toBe(true);
    expect(new DestinationApplicationError(4000, 'Invalid value passed for rate').isDuplicate()).toBe(false);
  });
});

describe('isFatalError', () => {
  it('aborts on credential and registry errors only', () => {
    expect(isFatalError(new TokenRefreshError('source', 'invalid_grant'))).toBe(true);
    expect(isFatalError(new AuthorizationError('destination'))).toBe(true);
    expect(isFatalError(new RegistryConflictError('customer', 7, 'c-1', 'c-2'))).toBe(true);
    expect(isFatalError(new DestinationApiError(400, ''))).toBe(false);
    expect(isFatalError(new SourceApiError(500, ''))).toBe(false);
    expect(isFatalError(new ConfigError('bad'))).toBe(false);
  });
});

describe('describeError', () => {
  it('prefers the human-readable form', () => {
    expect(describeError(new DestinationApplicationError(1001, 'Invoice number already exists'))).toBe(
      'Invoice number already exists (code 1001)'
    );
    expect(describeError(new TokenRefreshError('destination', 'invalid_code', 400))).toBe(
      'OAuth token exchange failed for Zoho Books: invalid_code | Status: 400 | Re-authorize with `books-migrate auth`'
    );
    expect(describeError(new SourceApiError(404, ''))).toBe('FreshBooks request failed with HTTP 404');
  });

  it('falls back to the message or the value', () => {
    expect(describeError(new RegistryConflictError('invoice', 3, 'i-1', 'i-2'))).toBe(
      'invoice 3 is already mapped to i-1, refusing to remap to i-2'
    );
    expect(describeError('boom')).toBe('boom');
  });
});
