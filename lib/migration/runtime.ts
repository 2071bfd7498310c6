import { TokenManager, createTokenManager } from '../auth/token-manager';
import { AppConfig, zohoApiBase } from '../config';
import { ConfigError } from '../errors';
import { FreshBooksClient } from '../freshbooks/http/client';
import { FreshBooksReader } from '../freshbooks/resources';
import { Clock, defaultFetch, defaultSleep, FetchFn, Sleep, systemClock } from '../http/runtime';
import { createLogger } from '../logging';
import { BusinessTagger } from '../mappers/business-tags';
import { CategoryMapping } from '../mappers/category-mapping';
import { isoDate } from '../mappers/values';
import { ZohoBooksClient } from '../zoho/http/client';
import { RateWindow } from '../zoho/http/rate-window';
import { StageContext, StageOptions } from './context';
import { IdMappingRegistry } from './id-registry';
import { MigrationPipeline } from './pipeline';
import { Printer } from './result';

export interface RuntimeOptions extends Partial<StageOptions> {
  skipItems?: boolean;
  print?: Printer;
  fetchFn?: FetchFn;
  sleep?: Sleep;
  clock?: Clock;
  /** Overrides the region's API base, e.g. for a local stand-in */
  zohoApiBase?: string;
  freshbooksApiBase?: string;
}

export interface MigrationRuntime {
  tokens: TokenManager;
  source: FreshBooksReader;
  destination: ZohoBooksClient;
  context: StageContext;
  pipeline: MigrationPipeline;
}

/**
 * Wire tokens, both API clients, the registry and the pipeline for one run
 */
export function createMigrationRuntime(config: AppConfig, options: RuntimeOptions = {}): MigrationRuntime {
  const stageOptions: StageOptions = {
    dryRun: options.dryRun ?? false,
    verbose: options.verbose ?? false,
    hierarchical: options.hierarchical ?? false,
  };

  if (stageOptions.hierarchical && !config.categoryMapping) {
    throw new ConfigError('Hierarchical category mode needs a "category_mapping" section in the configuration');
  }

  const fetchFn = options.fetchFn ?? defaultFetch;
  const sleep = options.sleep ?? defaultSleep;
  const clock = options.clock ?? systemClock;

  const tokens = createTokenManager(config, fetchFn);
  const source = new FreshBooksReader(
    new FreshBooksClient({
      accountId: config.freshbooks.accountId,
      tokens,
      apiBase: options.freshbooksApiBase,
      fetchFn,
    })
  );
  const destination = new ZohoBooksClient({
    apiBase: options.zohoApiBase ?? zohoApiBase(config.zoho.region),
    organizationId: config.zoho.organizationId,
    tokens,
    rateWindow: new RateWindow({ clock, sleep }),
    fetchFn,
    sleep,
    dryRun: stageOptions.dryRun,
  });

  const context: StageContext = {
    config,
    source,
    destination,
    registry: new IdMappingRegistry(),
    options: stageOptions,
    print: options.print ?? (line => console.log(line)),
    log: createLogger('migration'),
    categoryMapping: config.categoryMapping ? new CategoryMapping(config.categoryMapping) : undefined,
    tagger: config.businessTags ? new BusinessTagger(config.businessTags) : undefined,
    today: isoDate(new Date(clock())),
  };

  return {
    tokens,
    source,
    destination,
    context,
    pipeline: new MigrationPipeline(context, { skipItems: options.skipItems, clock }),
  };
}
