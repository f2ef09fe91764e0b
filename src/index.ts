#!/usr/bin/env node

import 'dotenv/config';
import path from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { OpenAIClassifier } from './classifier/openai.js';
import { loadConfig, summarizeConfig, type Config } from './config.js';
import { ConfigError } from './errors.js';
import { configureLogger, LOG_LEVELS } from './logger.js';
import { BackoffPolicy } from './retry/backoff.js';
import { StateStore } from './state/store.js';
import { TaskErrorReporter } from './sync/error-reporter.js';
import { SyncDaemon } from './sync/orchestrator.js';
import { loadTaxonomy, type Taxonomy } from './taxonomy/taxonomy.js';
import { TodoistListClient } from './todoist/client.js';

const VERSION = '0.1.0';

interface CliOptions {
  once?: boolean;
  check?: boolean;
  interval?: number;
  logLevel?: string;
  config?: string;
  stateFile?: string;
  logFile?: string;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a whole number of seconds.');
  }
  return parsed;
}

const program = new Command();

program
  .name('shopping-sync')
  .description('Automatically organize a Todoist shopping list into aisle sections using AI')
  .version(VERSION)
  .option('--once', 'Run one sync cycle and exit')
  .option('--check', 'Run a connectivity and configuration health check and exit')
  .option('--interval <seconds>', 'Sync interval in seconds (default: SYNC_INTERVAL_SECONDS or 60)', parseSeconds)
  .addOption(new Option('--log-level <level>', 'Log verbosity').choices(LOG_LEVELS))
  .option('--config <path>', 'Path to the categories YAML file')
  .option('--state-file <path>', 'Path to the sync state JSON file')
  .option('--log-file <path>', 'Also write logs to this file, rotated weekly')
  .addHelpText('after', '\nExample: shopping-sync --interval 120 --log-level debug --log-file logs/sync.log');

async function main(): Promise<number> {
  await program.parseAsync(process.argv);
  const opts = program.opts<CliOptions>();

  let config: Config;
  try {
    config = loadConfig({
      syncIntervalSeconds: opts.interval,
      logLevel: opts.logLevel,
      categoriesFile: opts.config,
      stateFile: opts.stateFile,
      logFile: opts.logFile,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  const logger = configureLogger({ level: config.logLevel, logFile: config.logFile });

  let taxonomy: Taxonomy;
  try {
    taxonomy = loadTaxonomy(config.categoriesFile);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }

  logger.info(`Shopping List Sync v${VERSION}`);
  logger.info(summarizeConfig(config));
  logger.debug(`Categories: ${taxonomy.ordered().map((c) => c.key).join(', ')}`);

  const backoff = new BackoffPolicy({
    maxAttempts: config.retryMaxAttempts,
    baseDelayMs: config.retryBaseDelayMs,
  });
  const client = new TodoistListClient({ backoff, logger });
  const classifier = new OpenAIClassifier({ backoff, logger });
  const store = new StateStore(path.resolve(config.stateFile));
  const errorReporter = new TaskErrorReporter({
    client,
    mode: config.errorHandlingMode,
    systemProjectId: config.systemProjectId,
    logger,
  });
  if (errorReporter.enabled) {
    logger.info(`Failed cycles will leave a task in Todoist project ${config.systemProjectId}`);
  }
  const daemon = new SyncDaemon({
    client,
    classifier,
    taxonomy,
    store,
    intervalSeconds: config.syncIntervalSeconds,
    concurrency: config.classifyConcurrency,
    retentionDays: config.stateRetentionDays,
    errorReporter,
    logger,
  });

  if (opts.check) {
    logger.info('Running health check...');
    const health = await daemon.healthCheck();
    for (const check of health.checks) {
      if (check.ok) logger.info(`✓ ${check.name}: ${check.detail}`);
      else logger.error(`✗ ${check.name}: ${check.detail}`);
    }
    if (health.ok) logger.info('Health check passed!');
    else logger.error('Health check failed!');
    return health.ok ? 0 : 1;
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down...`);
    daemon.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  if (opts.once) {
    logger.info('Running one-time sync...');
    const report = await daemon.runOnce();
    return report.status === 'failed' ? 1 : 0;
  }

  logger.info(`Starting daemon mode with ${daemon.intervalSeconds}s interval. Press Ctrl+C to stop.`);
  await daemon.start();
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
