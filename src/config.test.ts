import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const ENV_KEYS = [
  'TODOIST_SHOPPING_PROJECT_NAME',
  'TODOIST_SHOPPING_PROJECT_ID',
  'TODOIST_SYSTEM_PROJECT_ID',
  'OPENAI_BASE_URL',
  'OPENAI_MODEL',
  'SYNC_INTERVAL_SECONDS',
  'CATEGORIES_FILE',
  'STATE_FILE',
  'STATE_RETENTION_DAYS',
  'CLASSIFY_CONCURRENCY',
  'RETRY_MAX_ATTEMPTS',
  'RETRY_BASE_DELAY_MS',
  'LOG_LEVEL',
  'LOG_FILE',
  'ERROR_HANDLING_MODE',
];

// Must re-import loadConfig each test to avoid cached config
describe('loadConfig', () => {
  beforeEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
    vi.stubEnv('TODOIST_API_KEY', 'test-todoist-token');
    vi.stubEnv('OPENAI_API_KEY', 'test-key');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  async function freshConfigModule() {
    return import('./config.js');
  }

  it('uses default values', async () => {
    const { loadConfig } = await freshConfigModule();
    const config = loadConfig();
    expect(config.shoppingProjectName).toBe('shopping');
    expect(config.shoppingProjectId).toBeUndefined();
    expect(config.openaiModel).toBe('gpt-4o-mini');
    expect(config.syncIntervalSeconds).toBe(60);
    expect(config.categoriesFile).toBe('config/categories.yaml');
    expect(config.stateFile).toBe('data/sync_state.json');
    expect(config.stateRetentionDays).toBeUndefined();
    expect(config.classifyConcurrency).toBe(4);
    expect(config.retryMaxAttempts).toBe(3);
    expect(config.retryBaseDelayMs).toBe(1000);
    expect(config.logLevel).toBe('info');
    expect(config.logFile).toBeUndefined();
    expect(config.errorHandlingMode).toBe('log');
  });

  it('reads values from the environment', async () => {
    vi.stubEnv('TODOIST_SHOPPING_PROJECT_NAME', 'Groceries');
    vi.stubEnv('TODOIST_SHOPPING_PROJECT_ID', '2203306141');
    vi.stubEnv('SYNC_INTERVAL_SECONDS', '300');
    vi.stubEnv('STATE_RETENTION_DAYS', '30');
    vi.stubEnv('LOG_LEVEL', 'DEBUG');
    vi.stubEnv('ERROR_HANDLING_MODE', 'both');
    vi.stubEnv('LOG_FILE', 'logs/sync.log');
    const { loadConfig } = await freshConfigModule();
    const config = loadConfig();
    expect(config.shoppingProjectName).toBe('Groceries');
    expect(config.shoppingProjectId).toBe('2203306141');
    expect(config.syncIntervalSeconds).toBe(300);
    expect(config.stateRetentionDays).toBe(30);
    expect(config.logLevel).toBe('debug');
    expect(config.errorHandlingMode).toBe('both');
    expect(config.logFile).toBe('logs/sync.log');
  });

  it('strips surrounding quotes from API keys', async () => {
    vi.stubEnv('TODOIST_API_KEY', '"test-todoist-token"');
    vi.stubEnv('OPENAI_API_KEY', "'test-key'");
    const { loadConfig } = await freshConfigModule();
    const config = loadConfig();
    expect(config.todoistApiKey).toBe('test-todoist-token');
    expect(config.openaiApiKey).toBe('test-key');
  });

  it('lets overrides win over the environment', async () => {
    vi.stubEnv('SYNC_INTERVAL_SECONDS', '300');
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.stubEnv('LOG_FILE', 'logs/sync.log');
    const { loadConfig } = await freshConfigModule();
    const config = loadConfig({
      syncIntervalSeconds: 15,
      logLevel: 'error',
      categoriesFile: '/tmp/cats.yaml',
      stateFile: '/tmp/state.json',
      logFile: '/tmp/sync.log',
    });
    expect(config.syncIntervalSeconds).toBe(15);
    expect(config.logLevel).toBe('error');
    expect(config.categoriesFile).toBe('/tmp/cats.yaml');
    expect(config.stateFile).toBe('/tmp/state.json');
    expect(config.logFile).toBe('/tmp/sync.log');
  });

  it('throws ConfigError when TODOIST_API_KEY is missing', async () => {
    vi.stubEnv('TODOIST_API_KEY', '');
    const { loadConfig } = await freshConfigModule();
    const { ConfigError } = await import('./errors.js');
    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow('TODOIST_API_KEY is required.');
  });

  it('requires an OpenAI key unless a base URL is set', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const { loadConfig } = await freshConfigModule();
    expect(() => loadConfig()).toThrow(/OPENAI_API_KEY is required/);

    vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:11434/v1');
    const config = loadConfig();
    expect(config.openaiBaseUrl).toBe('http://localhost:11434/v1');
  });

  it('rejects an interval below five seconds', async () => {
    vi.stubEnv('SYNC_INTERVAL_SECONDS', '2');
    const { loadConfig } = await freshConfigModule();
    expect(() => loadConfig()).toThrow(/syncIntervalSeconds/);
  });

  it('rejects an unknown log level', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    const { loadConfig } = await freshConfigModule();
    expect(() => loadConfig()).toThrow(/Invalid configuration:\n {2}logLevel/);
  });

  it('rejects an unknown error handling mode', async () => {
    vi.stubEnv('ERROR_HANDLING_MODE', 'email');
    const { loadConfig } = await freshConfigModule();
    expect(() => loadConfig()).toThrow(/errorHandlingMode/);
  });

  it('caches the loaded config for getConfig', async () => {
    const { loadConfig, getConfig } = await freshConfigModule();
    const loaded = loadConfig();
    expect(getConfig()).toBe(loaded);
  });
});

describe('summarizeConfig', () => {
  it('reports keys as set or missing without their values', async () => {
    vi.resetModules();
    const { summarizeConfig } = await import('./config.js');
    const { testConfig } = await import('./__tests__/fixtures.js');
    const summary = summarizeConfig(testConfig({ openaiApiKey: '' }));
    expect(summary).toContain('  Todoist project: shopping (ID: auto-detect)');
    expect(summary).toContain('  Todoist API key: set');
    expect(summary).toContain('  OpenAI API key: missing');
    expect(summary).toContain('  Log file: none');
    expect(summary).not.toContain('test-todoist-token');
  });
});
