import { AppConfig } from '../config';
import { FreshBooksReader } from '../freshbooks/resources';
import { Logger } from '../logging';
import { BusinessTagger } from '../mappers/business-tags';
import { CategoryMapping } from '../mappers/category-mapping';
import { ZohoBooksClient } from '../zoho/http/client';
import { IdMappingRegistry } from './id-registry';
import { Printer } from './result';

export interface StageOptions {
  dryRun: boolean;
  verbose: boolean;
  /** Build the chart of accounts from the configured category hierarchy */
  hierarchical: boolean;
}

/**
 * Everything a stage reads or writes during one run
 */
export interface StageContext {
  config: AppConfig;
  source: FreshBooksReader;
  destination: ZohoBooksClient;
  registry: IdMappingRegistry;
  options: StageOptions;
  print: Printer;
  log: Logger;
  categoryMapping?: CategoryMapping;
  tagger?: BusinessTagger;
  /** yyyy-MM-dd used for records without a date */
  today: string;
}

/**
 * Print only in verbose mode
 */
export function detail(ctx: StageContext, line: string): void {
  if (ctx.options.verbose) {
    ctx.print(line);
  }
}
