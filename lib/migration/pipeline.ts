/**
 * Stage ordering, dependency handling and the run report
 */

import { v4 as uuidv4 } from 'uuid';
import { describeError } from '../errors';
import { Clock, systemClock } from '../http/runtime';
import { createLogger } from '../logging';
import { StageContext } from './context';
import { formatRunReport, MigrationResult, RunReport, StageSummary } from './result';
import { migrateCategories } from './stages/categories';
import { migrateCustomers, migrateVendors } from './stages/contacts';
import { migrateExpenses } from './stages/expenses';
import { migrateInvoices } from './stages/invoices';
import { migrateItems } from './stages/items';
import { migratePayments } from './stages/payments';
import { migrateTaxes } from './stages/taxes';

const log = createLogger('migration');

export type StageName =
  | 'categories'
  | 'taxes'
  | 'items'
  | 'customers'
  | 'vendors'
  | 'invoices'
  | 'expenses'
  | 'payments';

export const STAGE_ORDER: readonly StageName[] = [
  'categories',
  'taxes',
  'items',
  'customers',
  'vendors',
  'invoices',
  'expenses',
  'payments',
];

export const STAGE_LABELS: Record<StageName, string> = {
  categories: 'Categories',
  taxes: 'Taxes',
  items: 'Items',
  customers: 'Customers',
  vendors: 'Vendors',
  invoices: 'Invoices',
  expenses: 'Expenses',
  payments: 'Payments',
};

/** Stages whose mappings a stage cannot work without */
export const STAGE_DEPENDENCIES: Record<StageName, readonly StageName[]> = {
  categories: [],
  taxes: [],
  items: [],
  customers: [],
  vendors: [],
  invoices: ['customers'],
  expenses: ['categories'],
  payments: ['customers'],
};

type StageRunner = (ctx: StageContext, result: MigrationResult) => Promise<void>;

const STAGE_RUNNERS: Record<StageName, StageRunner> = {
  categories: migrateCategories,
  taxes: migrateTaxes,
  items: migrateItems,
  customers: migrateCustomers,
  vendors: migrateVendors,
  invoices: migrateInvoices,
  expenses: migrateExpenses,
  payments: migratePayments,
};

export function isStageName(value: string): value is StageName {
  return STAGE_ORDER.some(stage => stage === value);
}

export interface PipelineOptions {
  /** Leave the items stage out of runAll() */
  skipItems?: boolean;
  clock?: Clock;
  runId?: string;
}

/**
 * MigrationPipeline runs stages in dependency order against one registry.
 *
 * Stages and the records inside them run one at a time. A stage that throws
 * still prints its partial summary before the error propagates.
 */
export class MigrationPipeline {
  readonly runId: string;
  private readonly clock: Clock;
  private readonly skipItems: boolean;
  private readonly completed = new Set<StageName>();
  private readonly summaries: StageSummary[] = [];

  constructor(
    private readonly ctx: StageContext,
    options: PipelineOptions = {}
  ) {
    this.runId = options.runId ?? uuidv4();
    this.clock = options.clock ?? systemClock;
    this.skipItems = options.skipItems ?? false;
  }

  get stageSummaries(): StageSummary[] {
    return [...this.summaries];
  }

  /**
   * Run one stage, first running any dependency not yet completed in this run
   */
  async runStage(stage: StageName): Promise<MigrationResult> {
    for (const dependency of STAGE_DEPENDENCIES[stage]) {
      if (!this.completed.has(dependency)) {
        this.ctx.print(`${STAGE_LABELS[stage]} need ${STAGE_LABELS[dependency].toLowerCase()}; migrating them first`);
        await this.runStage(dependency);
      }
    }
    return this.execute(stage);
  }

  /**
   * Run every stage in order and stop at the first stage-level error
   */
  async runAll(): Promise<RunReport> {
    const startedAt = this.clock();
    let fatal: RunReport['fatal'];

    log.info('Migration started', { runId: this.runId, dryRun: this.ctx.options.dryRun });
    if (this.ctx.options.dryRun) {
      this.ctx.print('DRY RUN: nothing will be written to Zoho Books');
    }

    for (const stage of STAGE_ORDER) {
      if (stage === 'items' && this.skipItems) {
        this.ctx.print('Skipping items (--skip-items)');
        continue;
      }
      if (this.completed.has(stage)) {
        continue;
      }
      try {
        await this.runStage(stage);
      } catch (error) {
        fatal = { stage: STAGE_LABELS[stage], message: describeError(error) };
        log.error('Migration stopped', { runId: this.runId, stage, error: fatal.message });
        break;
      }
    }

    const finishedAt = this.clock();
    const report: RunReport = {
      runId: this.runId,
      dryRun: this.ctx.options.dryRun,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      durationMs: finishedAt - startedAt,
      stages: this.stageSummaries,
      fatal,
    };

    for (const line of formatRunReport(report)) {
      this.ctx.print(line);
    }
    log.info('Migration finished', { runId: this.runId, stages: report.stages.length, fatal: fatal !== undefined });
    return report;
  }

  private async execute(stage: StageName): Promise<MigrationResult> {
    const label = STAGE_LABELS[stage];
    const result = new MigrationResult();

    this.ctx.print('');
    log.info('Stage started', { runId: this.runId, stage });
    try {
      await STAGE_RUNNERS[stage](this.ctx, result);
      this.completed.add(stage);
    } finally {
      result.printSummary(label, this.ctx.print);
      this.summaries.push(result.toSummary(label));
      log.info('Stage finished', {
        runId: this.runId,
        stage,
        succeeded: result.succeeded,
        failed: result.failed,
        skipped: result.skipped,
      });
    }
    return result;
  }
}
