import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Backend, ConfigError } from './errors';
import { createLogger } from './logging';

const log = createLogger('cli');

export type ZohoRegion = 'com' | 'eu' | 'in' | 'au';

interface RegionEndpoints {
  apiBase: string;
  accountsBase: string;
}

/**
 * Zoho data centres. Unknown regions fall back to `com`.
 */
export const ZOHO_REGIONS: Record<ZohoRegion, RegionEndpoints> = {
  com: { apiBase: 'https://www.zohoapis.com/books/v3', accountsBase: 'https://accounts.zoho.com' },
  eu: { apiBase: 'https://www.zohoapis.eu/books/v3', accountsBase: 'https://accounts.zoho.eu' },
  in: { apiBase: 'https://www.zohoapis.in/books/v3', accountsBase: 'https://accounts.zoho.in' },
  au: { apiBase: 'https://www.zohoapis.com.au/books/v3', accountsBase: 'https://accounts.zoho.com.au' },
};

export const DEFAULT_ZOHO_REGION: ZohoRegion = 'com';

export const FRESHBOOKS_API_BASE = 'https://api.freshbooks.com';
export const FRESHBOOKS_AUTH_BASE = 'https://auth.freshbooks.com';

function isZohoRegion(value: string): value is ZohoRegion {
  return Object.prototype.hasOwnProperty.call(ZOHO_REGIONS, value);
}

export function resolveZohoRegion(region: string | undefined): ZohoRegion {
  const normalized = (region ?? '').trim().toLowerCase();
  return isZohoRegion(normalized) ? normalized : DEFAULT_ZOHO_REGION;
}

export function zohoApiBase(region: ZohoRegion): string {
  return ZOHO_REGIONS[region].apiBase;
}

export function zohoTokenUrl(region: ZohoRegion): string {
  return `${ZOHO_REGIONS[region].accountsBase}/oauth/v2/token`;
}

export function zohoAuthorizeUrl(region: ZohoRegion): string {
  return `${ZOHO_REGIONS[region].accountsBase}/oauth/v2/auth`;
}

const required = (field: string) => z.string().min(1, `${field} is required`);

const FreshBooksSectionSchema = z
  .object({
    client_id: required('freshbooks.client_id'),
    client_secret: required('freshbooks.client_secret'),
    access_token: z.string().default(''),
    refresh_token: z.string().default(''),
    account_id: required('freshbooks.account_id'),
  })
  .transform(section => ({
    clientId: section.client_id,
    clientSecret: section.client_secret,
    accessToken: section.access_token,
    refreshToken: section.refresh_token,
    accountId: section.account_id,
  }));

const ZohoSectionSchema = z
  .object({
    client_id: required('zoho.client_id'),
    client_secret: required('zoho.client_secret'),
    access_token: z.string().default(''),
    refresh_token: z.string().default(''),
    organization_id: required('zoho.organization_id'),
    region: z.string().optional(),
  })
  .transform(section => ({
    clientId: section.client_id,
    clientSecret: section.client_secret,
    accessToken: section.access_token,
    refreshToken: section.refresh_token,
    organizationId: section.organization_id,
    region: resolveZohoRegion(section.region),
  }));

const CategoryMappingSchema = z
  .object({
    hierarchy: z.record(z.string(), z.array(z.string())),
    mappings: z.record(z.string(), z.string()).default({}),
    default_category: z.string().optional(),
  })
  .transform(section => ({
    hierarchy: section.hierarchy,
    mappings: section.mappings,
    defaultCategory: section.default_category,
  }));

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}/, 'must be a yyyy-MM-dd date');

const BusinessTagsSchema = z
  .object({
    primary_tag: required('business_tags.primary_tag'),
    secondary_tag: required('business_tags.secondary_tag'),
    secondary_start_date: isoDate,
    secondary_keywords: z.array(z.string()).default([]),
    zoho_tag_id: z.string().optional(),
    zoho_primary_option_id: z.string().optional(),
    zoho_secondary_option_id: z.string().optional(),
  })
  .transform(section => ({
    primaryTag: section.primary_tag,
    secondaryTag: section.secondary_tag,
    secondaryStartDate: section.secondary_start_date,
    secondaryKeywords: section.secondary_keywords,
    zohoTagId: section.zoho_tag_id,
    zohoPrimaryOptionId: section.zoho_primary_option_id,
    zohoSecondaryOptionId: section.zoho_secondary_option_id,
  }));

/**
 * Keys of lookup sections are matched case-insensitively, so they are
 * lowercased once here.
 */
const lowercaseKeys = z
  .record(z.string(), z.string())
  .transform(record =>
    Object.fromEntries(Object.entries(record).map(([key, value]) => [key.trim().toLowerCase(), value]))
  );

const AppConfigSchema = z
  .object({
    freshbooks: FreshBooksSectionSchema,
    zoho: ZohoSectionSchema,
    category_mapping: CategoryMappingSchema.optional(),
    business_tags: BusinessTagsSchema.optional(),
    paid_through_mapping: lowercaseKeys.default({}),
    deposit_account_mapping: lowercaseKeys.default({}),
  })
  .transform(config => ({
    freshbooks: config.freshbooks,
    zoho: config.zoho,
    categoryMapping: config.category_mapping,
    businessTags: config.business_tags,
    paidThroughMapping: config.paid_through_mapping,
    depositAccountMapping: config.deposit_account_mapping,
  }));

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type FreshBooksConfig = AppConfig['freshbooks'];
export type ZohoConfig = AppConfig['zoho'];
export type CategoryMappingConfig = z.infer<typeof CategoryMappingSchema>;
export type BusinessTagConfig = z.infer<typeof BusinessTagsSchema>;

export const DEFAULT_CONFIG_PATH = 'config.json';

/**
 * Validate an already-parsed configuration object
 *
 * @throws {ConfigError} listing every invalid field
 */
export function parseConfig(raw: unknown): AppConfig {
  try {
    return AppConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }
}

/**
 * Load and validate the JSON configuration file
 */
export async function loadConfig(filePath: string = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  const resolved = path.resolve(process.cwd(), filePath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Configuration file not found at: ${resolved} (${error instanceof Error ? error.message : String(error)})`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid configuration format: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(raw);
}

export interface PersistedTokens {
  accessToken: string;
  refreshToken: string;
}

const SECTION_BY_BACKEND: Record<Backend, 'freshbooks' | 'zoho'> = {
  source: 'freshbooks',
  destination: 'zoho',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Write refreshed tokens back into the configuration file
 *
 * Only the two token fields of the backend's section change. The file is
 * written to a temp path and renamed over the original.
 */
export async function saveRefreshedTokens(
  filePath: string,
  backend: Backend,
  tokens: PersistedTokens
): Promise<void> {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(await fs.readFile(resolved, 'utf-8'));
  if (!isRecord(raw)) {
    throw new ConfigError(`Configuration at ${resolved} is not a JSON object`);
  }

  const sectionName = SECTION_BY_BACKEND[backend];
  const section = raw[sectionName];
  if (!isRecord(section)) {
    throw new ConfigError(`Configuration at ${resolved} has no "${sectionName}" section`);
  }

  const updated = {
    ...raw,
    [sectionName]: {
      ...section,
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
    },
  };

  const tempPath = `${resolved}.tmp`;
  await fs.writeFile(tempPath, `${JSON.stringify(updated, null, 2)}\n`, 'utf-8');
  await fs.rename(tempPath, resolved);

  log.info('Saved refreshed tokens', { backend, file: resolved });
}
