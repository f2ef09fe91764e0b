import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Config } from '../config.js';
import { parseTaxonomy, type Taxonomy } from '../taxonomy/taxonomy.js';

export const SAMPLE_CATEGORIES_YAML = `
categories:
  - key: produce
    emoji: "🥬"
    priority: 10
    keywords: [apples, bananas, onions]
  - key: bakery
    emoji: "🥖"
    priority: 20
    keywords: [bread, bagels]
  - key: dairy
    emoji: "🥛"
    priority: 30
    keywords: [milk, cheese, yogurt]
`;

/** produce, bakery, dairy and the synthesized catch-all "other". */
export function sampleTaxonomy(): Taxonomy {
  return parseTaxonomy(SAMPLE_CATEGORIES_YAML);
}

export function createTempDir(prefix = 'shopping-sync-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    todoistApiKey: 'test-todoist-token',
    shoppingProjectName: 'shopping',
    shoppingProjectId: undefined,
    systemProjectId: undefined,
    openaiApiKey: 'test-key',
    openaiBaseUrl: undefined,
    openaiModel: 'gpt-4o-mini',
    syncIntervalSeconds: 60,
    categoriesFile: 'config/categories.yaml',
    stateFile: 'data/sync_state.json',
    stateRetentionDays: undefined,
    classifyConcurrency: 4,
    retryMaxAttempts: 3,
    retryBaseDelayMs: 0,
    logLevel: 'silent',
    logFile: undefined,
    errorHandlingMode: 'log',
    ...overrides,
  };
}
