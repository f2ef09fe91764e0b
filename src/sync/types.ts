import type { Category } from '../taxonomy/taxonomy.js';
import type { Item } from '../todoist/types.js';

export interface CycleResult {
  itemsSeen: number;
  /** Items placed or recorded this cycle (classified, moved from a known record, or adopted). */
  processed: number;
  /** Already organized; no remote calls spent. */
  skipped: number;
  classified: number;
  /** Classifications that fell back to the catch-all category. */
  degraded: number;
  failed: number;
  duplicatesRemoved: number;
  /** Remote moves and deletes actually issued. */
  mutations: number;
  /** Items in sections the taxonomy does not own; left alone. */
  ignored: number;
  aborted: boolean;
}

export function emptyCycleResult(): CycleResult {
  return {
    itemsSeen: 0,
    processed: 0,
    skipped: 0,
    classified: 0,
    degraded: 0,
    failed: 0,
    duplicatesRemoved: 0,
    mutations: 0,
    ignored: 0,
    aborted: false,
  };
}

export type Decision =
  | { kind: 'skip'; item: Item; category: Category }
  | { kind: 'adopt'; item: Item; category: Category }
  | { kind: 'move'; item: Item; category: Category }
  | { kind: 'classify'; item: Item };

export interface CyclePlan {
  decisions: Decision[];
  /** Non-canonical members of duplicate groups, in deletion order. */
  duplicates: Item[];
  ignored: Item[];
}
