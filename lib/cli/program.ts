import { Command, InvalidArgumentError } from 'commander';
import { exchangeCodeForToken, getAuthorizationUrl } from '../auth/authorization-flow';
import { DEFAULT_CONFIG_PATH, loadConfig, saveRefreshedTokens } from '../config';
import { Backend, describeError } from '../errors';
import { defaultFetch, FetchFn } from '../http/runtime';
import { closeLogging, configureLogging, createLogger, envLogThreshold } from '../logging';
import { isStageName, StageName, STAGE_ORDER } from '../migration/pipeline';
import { Printer } from '../migration/result';
import { createMigrationRuntime } from '../migration/runtime';

const log = createLogger('cli');

export const DEFAULT_REDIRECT_URI = 'http://localhost:8080/callback';

export interface CliIO {
  print: Printer;
  printError: Printer;
  setExitCode: (code: number) => void;
  fetchFn?: FetchFn;
}

interface MigrateOptions {
  config: string;
  dryRun?: boolean;
  verbose?: boolean;
  hierarchical?: boolean;
  skipItems?: boolean;
  logFile?: string;
}

interface AuthOptions {
  config: string;
  redirectUri: string;
  code?: string;
}

const BACKEND_BY_PROVIDER: Record<string, Backend> = {
  freshbooks: 'source',
  zoho: 'destination',
};

function parseStage(value: string): StageName | 'all' {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'all' || isStageName(normalized)) {
    return normalized;
  }
  throw new InvalidArgumentError(`Expected one of: all, ${STAGE_ORDER.join(', ')}`);
}

function parseProvider(value: string): Backend {
  const provider = value.trim().toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(BACKEND_BY_PROVIDER, provider)) {
    throw new InvalidArgumentError('Expected freshbooks or zoho');
  }
  return BACKEND_BY_PROVIDER[provider];
}

const defaultIO: CliIO = {
  print: line => console.log(line),
  printError: line => console.error(line),
  setExitCode: code => {
    process.exitCode = code;
  },
};

async function runMigrate(stage: StageName | 'all', options: MigrateOptions, io: CliIO): Promise<void> {
  // LOG_LEVEL overrides the flag
  configureLogging({
    level: envLogThreshold() ?? (options.verbose ? 'debug' : 'warn'),
    filePath: options.logFile,
  });

  try {
    const config = await loadConfig(options.config);
    const runtime = createMigrationRuntime(config, {
      dryRun: options.dryRun,
      verbose: options.verbose,
      hierarchical: options.hierarchical,
      skipItems: options.skipItems,
      print: io.print,
      fetchFn: io.fetchFn,
    });

    runtime.tokens.onTokensRefreshed(event => saveRefreshedTokens(options.config, event.backend, event.tokens));

    if (stage === 'all') {
      const report = await runtime.pipeline.runAll();
      if (report.fatal) {
        io.setExitCode(1);
      }
      return;
    }

    await runtime.pipeline.runStage(stage);
  } catch (error) {
    const message = describeError(error);
    log.error('Migration failed', { stage, error: message });
    io.printError(`Error: ${message}`);
    io.setExitCode(1);
  } finally {
    await closeLogging();
  }
}

async function runAuth(backend: Backend, options: AuthOptions, io: CliIO): Promise<void> {
  try {
    const config = await loadConfig(options.config);
    const provider = backend === 'source' ? 'FreshBooks' : 'Zoho Books';

    if (!options.code) {
      io.print(`Open this URL to authorize ${provider}:`);
      io.print(getAuthorizationUrl(config, backend, options.redirectUri));
      io.print('Then run this command again with --code <code>');
      return;
    }

    const tokens = await exchangeCodeForToken(
      config,
      backend,
      options.code,
      options.redirectUri,
      io.fetchFn ?? defaultFetch
    );
    await saveRefreshedTokens(options.config, backend, tokens);
    io.print(`Saved ${provider} tokens to ${options.config}`);
  } catch (error) {
    io.printError(`Error: ${describeError(error)}`);
    io.setExitCode(1);
  }
}

/**
 * books-migrate command tree
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('books-migrate')
    .description('Migrate accounting data from FreshBooks to Zoho Books')
    .version('1.0.0');

  program
    .command('migrate')
    .description('Run one stage (with its dependencies) or every stage in order')
    .argument('<stage>', `all, ${STAGE_ORDER.join(', ')}`, parseStage)
    .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
    .option('--dry-run', 'Read everything, write nothing')
    .option('-v, --verbose', 'Print per-record detail')
    .option('--hierarchical', 'Build accounts from category_mapping.hierarchy')
    .option('--skip-items', 'Leave items out of "all"')
    .option('--log-file <path>', 'Also append structured logs to this file')
    .action(async (stage: StageName | 'all', options: MigrateOptions) => {
      await runMigrate(stage, options, io);
    });

  program
    .command('auth')
    .description('Authorize access: print the consent URL, or exchange a code for tokens')
    .argument('<provider>', 'freshbooks or zoho', parseProvider)
    .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
    .option('--redirect-uri <uri>', 'Redirect URI registered with the provider', DEFAULT_REDIRECT_URI)
    .option('--code <code>', 'Authorization code from the redirect')
    .action(async (backend: Backend, options: AuthOptions) => {
      await runAuth(backend, options, io);
    });

  return program;
}
