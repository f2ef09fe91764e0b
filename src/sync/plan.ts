import type { StateStore } from '../state/store.js';
import type { Category, Taxonomy } from '../taxonomy/taxonomy.js';
import type { Item, Section } from '../todoist/types.js';
import type { CyclePlan, Decision } from './types.js';

const NUMERIC_ID = /^\d+$/;

function compareIds(a: string, b: string): number {
  if (NUMERIC_ID.test(a) && NUMERIC_ID.test(b)) {
    const diff = BigInt(a) - BigInt(b);
    return diff < 0n ? -1 : diff > 0n ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function timeOf(item: Item): number {
  if (item.createdAt === null) return Number.POSITIVE_INFINITY;
  const ms = Date.parse(item.createdAt);
  return Number.isNaN(ms) ? Number.POSITIVE_INFINITY : ms;
}

/** Earliest created first; items without a timestamp last; ties by lowest id. */
export function compareCanonical(a: Item, b: Item): number {
  const ta = timeOf(a);
  const tb = timeOf(b);
  if (ta !== tb) return ta < tb ? -1 : 1;
  return compareIds(a.id, b.id);
}

/**
 * Groups items by fingerprint and keeps the earliest of each group.
 * Output order depends only on the items, never on the order they arrived in.
 */
export function partitionDuplicates(items: readonly Item[]): { canonical: Item[]; duplicates: Item[] } {
  const groups = new Map<string, Item[]>();
  for (const item of items) {
    const group = groups.get(item.fingerprint);
    if (group) group.push(item);
    else groups.set(item.fingerprint, [item]);
  }

  const canonical: Item[] = [];
  const duplicates: Item[] = [];
  for (const group of groups.values()) {
    group.sort(compareCanonical);
    canonical.push(group[0]);
    duplicates.push(...group.slice(1));
  }
  canonical.sort(compareCanonical);
  duplicates.sort(compareCanonical);
  return { canonical, duplicates };
}

/** Section id -> category, for sections whose name matches a taxonomy category. */
export function mapSections(sections: readonly Section[], taxonomy: Taxonomy): Map<string, Category> {
  const map = new Map<string, Category>();
  for (const section of sections) {
    const category = taxonomy.bySectionName(section.name);
    if (category) map.set(section.id, category);
  }
  return map;
}

function decide(item: Item, current: Category | undefined, store: StateStore, taxonomy: Taxonomy): Decision {
  const record = store.get(item.fingerprint);
  // A record naming a category that has since left the taxonomy counts as no record
  const recorded = record ? taxonomy.byKey(record.category) : undefined;

  if (!record || !recorded) return { kind: 'classify', item };
  if (current && current.key === recorded.key) {
    return record.processed ? { kind: 'skip', item, category: recorded } : { kind: 'adopt', item, category: current };
  }
  // Someone moved it into another category section by hand; that placement wins
  if (current) return { kind: 'adopt', item, category: current };
  return { kind: 'move', item, category: recorded };
}

export function planCycle(
  items: readonly Item[],
  sections: readonly Section[],
  store: StateStore,
  taxonomy: Taxonomy,
): CyclePlan {
  const sectionCategories = mapSections(sections, taxonomy);
  // Duplicates are found across the whole list, hand-made sections included
  const { canonical, duplicates } = partitionDuplicates(items);

  const decisions: Decision[] = [];
  const ignored: Item[] = [];
  for (const item of canonical) {
    if (item.sectionId === null) {
      decisions.push(decide(item, undefined, store, taxonomy));
      continue;
    }
    const current = sectionCategories.get(item.sectionId);
    if (current) decisions.push(decide(item, current, store, taxonomy));
    else ignored.push(item);
  }
  return { decisions, duplicates, ignored };
}
