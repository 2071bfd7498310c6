import { AppConfig, parseConfig } from '@/lib/config';

export const RAW_TEST_CONFIG = {
  freshbooks: {
    client_id: 'fb-client',
    client_secret: 'test-secret',
    access_token: 'fb-access-0',
    refresh_token: 'fb-refresh-0',
    account_id: 'acct-fb',
  },
  zoho: {
    client_id: 'zoho-client',
    client_secret: 'test-secret',
    access_token: 'zoho-access-0',
    refresh_token: 'zoho-refresh-0',
    organization_id: 'org-1',
  },
};

export function testConfig(extra: Record<string, unknown> = {}): AppConfig {
  return parseConfig({ ...RAW_TEST_CONFIG, ...extra });
}
