import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

const unquote = (val: unknown) =>
  typeof val === 'string' ? val.trim().replace(/^(['"])(.*)\1$/, '$2') : val;

const emptyToUndefined = (val: unknown) => (val === '' ? undefined : val);

const intSetting = (min: number, max: number, fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const configSchema = z.object({
  todoistApiKey: z.preprocess(unquote, z.string().default('')),
  shoppingProjectName: z.string().min(1).default('shopping'),
  shoppingProjectId: z.preprocess(emptyToUndefined, z.string().optional()),
  systemProjectId: z.preprocess(emptyToUndefined, z.string().optional()),
  openaiApiKey: z.preprocess(unquote, z.string().default('')),
  openaiBaseUrl: z.preprocess(emptyToUndefined, z.string().url().optional()),
  openaiModel: z.string().min(1).default('gpt-4o-mini'),
  syncIntervalSeconds: intSetting(5, 86_400, 60),
  categoriesFile: z.string().min(1).default('config/categories.yaml'),
  stateFile: z.string().min(1).default('data/sync_state.json'),
  stateRetentionDays: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).optional()),
  classifyConcurrency: intSetting(1, 32, 4),
  retryMaxAttempts: intSetting(1, 10, 3),
  retryBaseDelayMs: intSetting(0, 60_000, 1000),
  logLevel: z.preprocess(
    (val) => (typeof val === 'string' ? val.toLowerCase() : val),
    z.enum(LOG_LEVELS).default('info'),
  ),
  logFile: z.preprocess(emptyToUndefined, z.string().optional()),
  errorHandlingMode: z.enum(['log', 'task', 'both']).default('log'),
});

export type Config = z.infer<typeof configSchema>;

/** Values from CLI flags; they win over the environment. */
export interface ConfigOverrides {
  syncIntervalSeconds?: number;
  logLevel?: string;
  categoriesFile?: string;
  stateFile?: string;
  logFile?: string;
}

let cachedConfig: Config | null = null;

export function loadConfig(overrides: ConfigOverrides = {}): Config {
  const raw = {
    todoistApiKey: process.env.TODOIST_API_KEY ?? '',
    shoppingProjectName: process.env.TODOIST_SHOPPING_PROJECT_NAME || undefined,
    shoppingProjectId: process.env.TODOIST_SHOPPING_PROJECT_ID,
    systemProjectId: process.env.TODOIST_SYSTEM_PROJECT_ID,
    openaiApiKey: process.env.OPENAI_API_KEY ?? '',
    openaiBaseUrl: process.env.OPENAI_BASE_URL,
    openaiModel: process.env.OPENAI_MODEL || undefined,
    syncIntervalSeconds: overrides.syncIntervalSeconds ?? process.env.SYNC_INTERVAL_SECONDS,
    categoriesFile: overrides.categoriesFile ?? (process.env.CATEGORIES_FILE || undefined),
    stateFile: overrides.stateFile ?? (process.env.STATE_FILE || undefined),
    stateRetentionDays: process.env.STATE_RETENTION_DAYS,
    classifyConcurrency: process.env.CLASSIFY_CONCURRENCY,
    retryMaxAttempts: process.env.RETRY_MAX_ATTEMPTS,
    retryBaseDelayMs: process.env.RETRY_BASE_DELAY_MS,
    logLevel: overrides.logLevel ?? (process.env.LOG_LEVEL || undefined),
    logFile: overrides.logFile ?? process.env.LOG_FILE,
    errorHandlingMode: process.env.ERROR_HANDLING_MODE || undefined,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const config = result.data;

  if (!config.todoistApiKey) {
    throw new ConfigError('TODOIST_API_KEY is required.');
  }
  if (!config.openaiApiKey && !config.openaiBaseUrl) {
    throw new ConfigError(
      'OPENAI_API_KEY is required unless OPENAI_BASE_URL points at a server that needs no key.',
    );
  }

  cachedConfig = config;
  return cachedConfig;
}

export function getConfig(): Config {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/** Human-readable summary for the startup banner. Keys are reported as set/unset only. */
export function summarizeConfig(config: Config): string {
  return [
    'Configuration:',
    `  Todoist project: ${config.shoppingProjectName} (ID: ${config.shoppingProjectId ?? 'auto-detect'})`,
    `  Todoist API key: ${config.todoistApiKey ? 'set' : 'missing'}`,
    `  OpenAI model: ${config.openaiModel}${config.openaiBaseUrl ? ` via ${config.openaiBaseUrl}` : ''}`,
    `  OpenAI API key: ${config.openaiApiKey ? 'set' : 'missing'}`,
    `  Sync interval: ${config.syncIntervalSeconds}s`,
    `  Categories file: ${config.categoriesFile}`,
    `  State file: ${config.stateFile}`,
    `  Error handling: ${config.errorHandlingMode}`,
    `  Log level: ${config.logLevel}`,
    `  Log file: ${config.logFile ?? 'none'}`,
  ].join('\n');
}
