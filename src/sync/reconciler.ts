import type { Classification, Classifier } from '../classifier/types.js';
import { CycleAbortedError, describeError, isFatalCycleError } from '../errors.js';
import { getLogger, type Logger } from '../logger.js';
import { AbortedError } from '../retry/backoff.js';
import type { StateStore } from '../state/store.js';
import type { Category, Taxonomy } from '../taxonomy/taxonomy.js';
import type { Item, ListClient, Section } from '../todoist/types.js';
import { planCycle } from './plan.js';
import { emptyCycleResult, type CycleResult, type Decision } from './types.js';

export interface ReconcilerOptions {
  client: ListClient;
  classifier: Classifier;
  taxonomy: Taxonomy;
  store: StateStore;
  logger?: Logger;
  /** Classification calls in flight at once. */
  concurrency?: number;
  now?: () => Date;
}

/**
 * One pass over the list: dedupe, classify what is new, move items into their
 * category sections and record them. Remote and local mutations are applied
 * one item at a time in canonical order; only classifier calls run in parallel.
 *
 * The store is updated in memory only. Persisting it is the caller's job.
 */
export class Reconciler {
  private readonly client: ListClient;
  private readonly classifier: Classifier;
  private readonly taxonomy: Taxonomy;
  private readonly store: StateStore;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly now: () => Date;

  constructor(options: ReconcilerOptions) {
    this.client = options.client;
    this.classifier = options.classifier;
    this.taxonomy = options.taxonomy;
    this.store = options.store;
    this.logger = options.logger ?? getLogger();
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.now = options.now ?? (() => new Date());
  }

  async reconcile(
    projectId: string,
    items: readonly Item[],
    sections: readonly Section[],
    signal?: AbortSignal,
  ): Promise<CycleResult> {
    const result = emptyCycleResult();
    result.itemsSeen = items.length;

    const plan = planCycle(items, sections, this.store, this.taxonomy);
    result.ignored = plan.ignored.length;

    const classifications = new Map<string, PromiseSettledResult<Classification>>();

    try {
      for (let i = 0; i < plan.decisions.length; i++) {
        if (signal?.aborted) {
          result.aborted = true;
          return result;
        }
        const decision = plan.decisions[i];
        try {
          if (decision.kind === 'classify' && !classifications.has(decision.item.id)) {
            await this.prefetch(plan.decisions, i, classifications, signal);
          }
          await this.apply(projectId, decision, classifications, result, signal);
        } catch (err) {
          this.recover(err, decision.item, result);
        }
      }

      for (const duplicate of plan.duplicates) {
        if (signal?.aborted) {
          result.aborted = true;
          return result;
        }
        try {
          if (await this.client.deleteItem(duplicate.id, signal)) {
            result.duplicatesRemoved++;
            result.mutations++;
            this.logger.info(`Deleted duplicate item "${duplicate.content}" (${duplicate.id})`);
          } else {
            this.logger.debug(`Duplicate item ${duplicate.id} was already gone`);
          }
        } catch (err) {
          this.recover(err, duplicate, result);
        }
      }
    } catch (err) {
      if (err instanceof AbortedError) {
        result.aborted = true;
        return result;
      }
      throw err;
    }

    return result;
  }

  /**
   * Counts a failed item. Auth, rejected requests, a missing project and
   * exhausted remote retries end the cycle; anything else only skips the item.
   */
  private recover(err: unknown, item: Item, result: CycleResult): void {
    if (err instanceof AbortedError) throw err;
    result.failed++;
    const where = `item ${item.id} ("${item.content}")`;
    if (isFatalCycleError(err)) {
      throw new CycleAbortedError(`Sync cycle aborted at ${where}: ${describeError(err)}`, result, err);
    }
    this.logger.error(`Skipping ${where}: ${describeError(err)}`);
  }

  /**
   * Classify the pending item at `from` together with the next few that need it,
   * so results arrive in parallel but are still applied in order. A failure is
   * held until its own item comes up.
   */
  private async prefetch(
    decisions: readonly Decision[],
    from: number,
    classifications: Map<string, PromiseSettledResult<Classification>>,
    signal?: AbortSignal,
  ): Promise<void> {
    const batch: Item[] = [];
    for (let i = from; i < decisions.length && batch.length < this.concurrency; i++) {
      const decision = decisions[i];
      if (decision.kind === 'classify' && !classifications.has(decision.item.id)) batch.push(decision.item);
    }

    const results = await Promise.allSettled(
      batch.map((item) => this.classifier.classify(item.content, this.taxonomy, signal)),
    );
    for (let j = 0; j < batch.length; j++) {
      classifications.set(batch[j].id, results[j]);
    }
  }

  private async apply(
    projectId: string,
    decision: Decision,
    classifications: Map<string, PromiseSettledResult<Classification>>,
    result: CycleResult,
    signal?: AbortSignal,
  ): Promise<void> {
    const { item } = decision;

    switch (decision.kind) {
      case 'skip':
        this.record(item, decision.category);
        result.skipped++;
        return;

      case 'adopt':
        this.logger.info(`Keeping "${item.content}" in ${decision.category.label} where it was placed`);
        this.record(item, decision.category);
        result.processed++;
        return;

      case 'move':
        await this.place(projectId, item, decision.category, result, signal);
        this.record(item, decision.category);
        result.processed++;
        return;

      case 'classify': {
        const settled = classifications.get(item.id);
        if (!settled) {
          throw new Error(`No classification available for item ${item.id}`);
        }
        if (settled.status === 'rejected') throw settled.reason;
        const classification = settled.value;
        result.classified++;

        if (classification.degraded) {
          result.degraded++;
          this.logger.warn(
            `Degraded classification for item ${item.id} ("${item.content}"), using ${classification.category.label}: ${classification.degraded.message}`,
          );
          await this.place(projectId, item, classification.category, result, signal);
          // No record: the item is classified again next cycle
          return;
        }

        this.logger.debug(`Classified "${item.content}" as ${classification.category.key}`);
        await this.place(projectId, item, classification.category, result, signal);
        this.record(item, classification.category);
        result.processed++;
        return;
      }
    }
  }

  private async place(
    projectId: string,
    item: Item,
    category: Category,
    result: CycleResult,
    signal?: AbortSignal,
  ): Promise<void> {
    const sectionId = await this.client.ensureSection(projectId, category, signal);
    if (await this.client.moveItem(item, sectionId, signal)) {
      result.mutations++;
      this.logger.info(`Moved item to ${category.label}: ${item.content}`);
    }
  }

  private record(item: Item, category: Category): void {
    this.store.upsert(item.fingerprint, {
      category: category.key,
      lastSeen: this.now().toISOString(),
      processed: true,
    });
  }
}
