/**
 * Per-stage outcome counting and summary printing
 */

export type Printer = (line: string) => void;

export const MAX_RECORDED_ERRORS = 10;

export interface RecordError {
  label: string;
  message: string;
}

export interface StageSummary {
  label: string;
  succeeded: number;
  failed: number;
  skipped: number;
  existing: number;
  errors: RecordError[];
  totalErrors: number;
}

/**
 * Counters for one stage plus the first few error details
 */
export class MigrationResult {
  succeeded = 0;
  failed = 0;
  skipped = 0;
  /** Subset of succeeded that reused an existing destination record */
  existing = 0;
  private readonly errors: RecordError[] = [];

  recordSuccess(): void {
    this.succeeded += 1;
  }

  recordExisting(): void {
    this.succeeded += 1;
    this.existing += 1;
  }

  recordSkip(): void {
    this.skipped += 1;
  }

  recordFailure(label: string, message: string): void {
    this.failed += 1;
    if (this.errors.length < MAX_RECORDED_ERRORS) {
      this.errors.push({ label, message });
    }
  }

  getErrors(): RecordError[] {
    return [...this.errors];
  }

  get total(): number {
    return this.succeeded + this.failed + this.skipped;
  }

  toSummary(label: string): StageSummary {
    return {
      label,
      succeeded: this.succeeded,
      failed: this.failed,
      skipped: this.skipped,
      existing: this.existing,
      errors: this.getErrors(),
      totalErrors: this.failed,
    };
  }

  printSummary(label: string, print: Printer): void {
    for (const line of formatStageSummary(this.toSummary(label))) {
      print(line);
    }
  }
}

export function formatStageSummary(summary: StageSummary): string[] {
  const lines = [
    '',
    `${summary.label} Migration Summary:`,
    `  Succeeded: ${summary.succeeded}`,
  ];
  if (summary.existing > 0) {
    lines.push(`    (already in Zoho Books: ${summary.existing})`);
  }
  lines.push(`  Failed: ${summary.failed}`, `  Skipped: ${summary.skipped}`);

  if (summary.errors.length > 0) {
    lines.push('  Errors:');
    for (const error of summary.errors) {
      lines.push(`    - ${error.label}: ${error.message}`);
    }
    const hidden = summary.totalErrors - summary.errors.length;
    if (hidden > 0) {
      lines.push(`    ... and ${hidden} more errors`);
    }
  }
  return lines;
}

export interface RunReport {
  runId: string;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  stages: StageSummary[];
  fatal?: { stage: string; message: string };
}

export function formatRunReport(report: RunReport): string[] {
  const totals = report.stages.reduce(
    (acc, stage) => ({
      succeeded: acc.succeeded + stage.succeeded,
      failed: acc.failed + stage.failed,
      skipped: acc.skipped + stage.skipped,
    }),
    { succeeded: 0, failed: 0, skipped: 0 }
  );

  const lines = [
    '',
    '='.repeat(60),
    report.fatal ? 'Migration Stopped' : 'Migration Complete!',
    '='.repeat(60),
    `Run: ${report.runId}${report.dryRun ? ' (dry run)' : ''}`,
    `Stages: ${report.stages.map(stage => stage.label).join(', ') || 'none'}`,
    `Totals: ${totals.succeeded} succeeded, ${totals.failed} failed, ${totals.skipped} skipped`,
    `Duration: ${(report.durationMs / 1000).toFixed(1)}s`,
  ];
  if (report.fatal) {
    lines.push(`Fatal error in ${report.fatal.stage}: ${report.fatal.message}`);
  }
  return lines;
}
