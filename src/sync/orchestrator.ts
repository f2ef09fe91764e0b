import type { Classifier } from '../classifier/types.js';
import {
  CycleAbortedError,
  StateCorruptError,
  StatePersistError,
  SyncError,
  describeError,
} from '../errors.js';
import { getLogger, type Logger } from '../logger.js';
import { AbortedError, sleep } from '../retry/backoff.js';
import type { StateStore } from '../state/store.js';
import type { Taxonomy } from '../taxonomy/taxonomy.js';
import type { ListClient, Project } from '../todoist/types.js';
import type { ErrorReporter } from './error-reporter.js';
import { Reconciler } from './reconciler.js';
import { emptyCycleResult, type CycleResult } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export type DaemonState = 'idle' | 'running' | 'stopped';

export type CycleStatus = 'ok' | 'degraded' | 'failed' | 'aborted';

export interface CycleReport {
  status: CycleStatus;
  result: CycleResult;
  /** Fatal cycle error, if any. */
  error?: Error;
  /** Set when the end-of-cycle save failed; retried next cycle. */
  persistError?: StatePersistError;
  durationMs: number;
}

export interface HealthCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface HealthReport {
  ok: boolean;
  checks: HealthCheck[];
}

export interface SyncDaemonOptions {
  client: ListClient;
  classifier: Classifier;
  taxonomy: Taxonomy;
  store: StateStore;
  intervalSeconds: number;
  concurrency?: number;
  /** Records unseen for longer than this are pruned before each save. Unset keeps everything. */
  retentionDays?: number;
  errorReporter?: ErrorReporter;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Drives sync cycles: once, or on an interval until stopped.
 *
 * Precondition: only one process runs against a given state file.
 */
export class SyncDaemon {
  private _state: DaemonState = 'idle';
  private readonly stopController = new AbortController();
  private readonly reconciler: Reconciler;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private loopRunning = false;

  constructor(private readonly options: SyncDaemonOptions) {
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => new Date());
    this.sleepFn = options.sleep ?? sleep;
    this.reconciler = new Reconciler({
      client: options.client,
      classifier: options.classifier,
      taxonomy: options.taxonomy,
      store: options.store,
      logger: this.logger,
      concurrency: options.concurrency,
      now: this.now,
    });
  }

  get state(): DaemonState {
    return this._state;
  }

  get intervalSeconds(): number {
    return this.options.intervalSeconds;
  }

  /** Runs a single cycle. Never throws for cycle-level failures; inspect the report. */
  async runOnce(): Promise<CycleReport> {
    if (this._state === 'running') {
      throw new SyncError('A sync cycle is already running');
    }
    if (this._state === 'stopped') {
      throw new SyncError('Daemon has been stopped');
    }

    this._state = 'running';
    const started = Date.now();
    const signal = this.stopController.signal;
    this.logger.info('Starting Todoist sync check...');

    try {
      this.ensureStateLoaded();

      let result: CycleResult = emptyCycleResult();
      let status: CycleStatus = 'ok';
      let error: Error | undefined;

      try {
        const { client } = this.options;
        const project = await client.resolveProject();
        const sections = await client.listSections(project.id, signal);
        const items = await client.fetchItems(project.id, signal);
        result = await this.reconciler.reconcile(project.id, items, sections, signal);
        if (result.aborted) status = 'aborted';
        else if (result.degraded > 0 || result.failed > 0) status = 'degraded';
      } catch (err) {
        if (err instanceof CycleAbortedError) {
          result = err.partial;
          status = 'failed';
          error = err;
        } else if (err instanceof AbortedError) {
          result.aborted = true;
          status = 'aborted';
        } else {
          status = 'failed';
          error = err instanceof Error ? err : new Error(String(err));
        }
      }

      // Commit point: progress made before an abort or failure is kept
      const persistError = this.commit(status);
      if (persistError && status === 'ok') status = 'degraded';

      const report: CycleReport = {
        status,
        result,
        ...(error ? { error } : {}),
        ...(persistError ? { persistError } : {}),
        durationMs: Date.now() - started,
      };
      this.logReport(report);

      if (error) await this.options.errorReporter?.report(error);
      return report;
    } finally {
      if (this._state === 'running') this._state = this.stopController.signal.aborted ? 'stopped' : 'idle';
    }
  }

  /** Cycles until `stop()` is called. Resolves once the loop has exited. */
  async start(): Promise<void> {
    if (this.loopRunning) throw new SyncError('Sync loop already started');
    this.loopRunning = true;
    const signal = this.stopController.signal;
    this.logger.info(`Starting sync loop (interval: ${this.options.intervalSeconds}s)`);

    try {
      while (!signal.aborted) {
        await this.runOnce();
        if (signal.aborted) break;
        try {
          await this.sleepFn(this.options.intervalSeconds * 1000, signal);
        } catch (err) {
          if (err instanceof AbortedError) break;
          throw err;
        }
      }
    } finally {
      this.loopRunning = false;
      this._state = 'stopped';
      this.logger.info('Sync loop stopped');
    }
  }

  /** Interrupts the sleep, and the running cycle at its next safe point. */
  stop(): void {
    if (!this.stopController.signal.aborted) {
      this.logger.info('Received stop request, finishing current step...');
      this.stopController.abort();
    }
    if (this._state === 'idle') this._state = 'stopped';
  }

  async healthCheck(): Promise<HealthReport> {
    const { client, classifier, taxonomy, store } = this.options;
    const checks: HealthCheck[] = [];

    const check = async (name: string, fn: () => Promise<string> | string): Promise<void> => {
      try {
        checks.push({ name, ok: true, detail: await fn() });
      } catch (err) {
        checks.push({ name, ok: false, detail: describeError(err) });
      }
    };

    checks.push({ name: 'taxonomy', ok: true, detail: `${taxonomy.size} categories loaded` });

    let project: Project | undefined;
    try {
      project = await client.resolveProject();
      checks.push({
        name: 'todoist-project',
        ok: true,
        detail: `Connected to Todoist project: ${project.name} (ID: ${project.id})`,
      });
    } catch (err) {
      checks.push({ name: 'todoist-project', ok: false, detail: describeError(err) });
    }

    if (project) {
      const projectId = project.id;
      await check('todoist-sections', async () => {
        const sections = await client.listSections(projectId);
        const names = new Set(sections.map((s) => s.name));
        const present = taxonomy.ordered().filter((c) => names.has(c.sectionName)).length;
        return `Found ${sections.length} sections in project (${present}/${taxonomy.size} category sections exist)`;
      });
    }

    await check('classifier', async () => {
      await classifier.ping();
      return 'Classifier reachable';
    });

    await check('state', () => {
      try {
        if (!store.loaded) store.load();
        return `${store.size} records in ${store.filePath}, last sync ${store.lastSync ?? 'never'}`;
      } catch (err) {
        if (err instanceof StateCorruptError) {
          return `${describeError(err)}; it will be reset on the next cycle`;
        }
        throw err;
      }
    });

    return { ok: checks.every((c) => c.ok), checks };
  }

  private ensureStateLoaded(): void {
    const { store } = this.options;
    if (store.loaded) return;
    try {
      store.load();
      this.logger.debug(`Loaded state with ${store.size} records, last sync ${store.lastSync ?? 'never'}`);
    } catch (err) {
      if (!(err instanceof StateCorruptError)) throw err;
      this.logger.warn(`${err.message}. Starting from empty state; every item will be reprocessed.`);
      store.reset();
    }
  }

  private commit(status: CycleStatus): StatePersistError | undefined {
    const { store, retentionDays } = this.options;
    if (retentionDays !== undefined) {
      const pruned = store.pruneOlderThan(new Date(this.now().getTime() - retentionDays * DAY_MS));
      if (pruned > 0) this.logger.info(`Pruned ${pruned} state record(s) unseen for ${retentionDays} days`);
    }
    if (status !== 'failed') store.markSynced(this.now());

    try {
      store.save();
      this.logger.debug(`Saved state with ${store.size} records`);
      return undefined;
    } catch (err) {
      if (!(err instanceof StatePersistError)) throw err;
      this.logger.error(`${err.message}. Will retry next cycle.`);
      return err;
    }
  }

  private logReport(report: CycleReport): void {
    const r = report.result;
    const summary =
      `${r.itemsSeen} items, ${r.processed} processed, ${r.skipped} skipped, ${r.classified} classified ` +
      `(${r.degraded} degraded), ${r.duplicatesRemoved} duplicates removed, ${r.mutations} mutations ` +
      `in ${report.durationMs}ms`;

    switch (report.status) {
      case 'ok':
        this.logger.info(`Todoist sync check completed: ${summary}`);
        break;
      case 'degraded':
        this.logger.warn(`Todoist sync check completed with degraded results: ${summary}`);
        break;
      case 'aborted':
        this.logger.warn(`Todoist sync check stopped early: ${summary}`);
        break;
      case 'failed':
        this.logger.error(
          `Todoist sync check failed: ${report.error ? describeError(report.error) : 'unknown error'} (${summary})`,
        );
        break;
    }
  }
}
