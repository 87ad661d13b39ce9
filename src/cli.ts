import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { log } from './logger.js';
import { loadConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { createMailer, type Mailer } from './emailer.js';
import { createSourceFetcher, type SourceFetcher } from './fetcher.js';
import { runPipeline } from './pipeline.js';
import { SeenStore } from './store.js';
import type { RunStatus } from './types.js';

export const DEFAULT_STATUS_PATH = 'data/last_run_status.json';

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  statusPath?: string;
  /** Replaces the HTTP fetcher built from the config. */
  fetchSource?: SourceFetcher;
  /** Replaces the mailer built from the config and environment. */
  mailer?: Mailer;
}

function writeStatus(path: string, status: RunStatus): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(status, null, 2));
}

export function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index < 0) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Missing value for ${name}`);
  }
  return value;
}

async function execute(args: string[], options: CliOptions, statusPath: string): Promise<number> {
  const isValidate = args.includes('--validate');
  const isDryRun = args.includes('--dry-run');
  const configPath = optionValue(args, '--config') ?? './config.yaml';

  // 1. Load and validate config
  const config = loadConfig(configPath);

  if (isValidate) {
    log.info(`Config valid: ${config.sources.length} sources, ${config.email.toEmails.length} recipients`);
    return 0;
  }

  // 2. Mail credentials are checked before anything is fetched
  const mailer = isDryRun ? null : (options.mailer ?? createMailer(config.email, options.env ?? process.env));

  // 3. Run against the persisted history
  const store = SeenStore.open(config.store.path);
  let status: RunStatus;
  try {
    const { groups: _groups, ...report } = await runPipeline({
      config,
      store,
      fetchSource: options.fetchSource ?? createSourceFetcher(config.fetch),
      mailer,
    });
    status = report;
  } finally {
    store.close();
  }

  // 4. Write run status
  writeStatus(statusPath, status);
  log.info(`Status written to ${statusPath}`);
  return status.success ? 0 : 1;
}

/** Runs once and resolves with the process exit code. */
export async function run(args: string[], options: CliOptions = {}): Promise<number> {
  const startTime = Date.now();
  const statusPath = options.statusPath ?? DEFAULT_STATUS_PATH;

  try {
    return await execute(args, options, statusPath);
  } catch (err: unknown) {
    const message = errorMessage(err);
    log.error(message);
    writeStatus(statusPath, {
      timestamp: new Date().toISOString(),
      success: false,
      phase: 'FAILED',
      sourcesFetched: 0,
      sourcesFailed: 0,
      listingsFound: 0,
      listingsMatched: 0,
      listingsNew: 0,
      emailSent: false,
      durationMs: Date.now() - startTime,
      errors: [message],
    });
    return 1;
  }
}
