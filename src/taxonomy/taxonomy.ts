import fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, describeError } from '../errors.js';

export const FALLBACK_KEY = 'other';

export interface Category {
  key: string;
  label: string;
  emoji: string;
  priority: number;
  keywords: string[];
  /** Name of the list section that holds this category's items. */
  sectionName: string;
}

const keySchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[a-z0-9_]+$/i, 'keys may only contain letters, digits and underscores');

const entrySchema = z.object({
  key: keySchema,
  label: z.string().trim().min(1).optional(),
  emoji: z.string().trim().default(''),
  priority: z.number().int().nonnegative(),
  keywords: z.array(z.string().trim().min(1)).default([]),
});

// Mapping form: `dairy: { emoji: 🥛, keywords: [...] }`, priority optional (document order)
const mappedEntrySchema = entrySchema.omit({ key: true }).extend({
  priority: z.number().int().nonnegative().optional(),
});

const documentSchema = z.object({
  categories: z.union([
    z.array(entrySchema).min(1),
    z.record(keySchema, mappedEntrySchema.nullable()),
  ]),
});

type Entry = z.infer<typeof entrySchema>;

export function titleCase(key: string): string {
  return key
    .split('_')
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

function toCategory(entry: Entry): Category {
  const label = entry.label ?? titleCase(entry.key);
  return {
    key: entry.key.toLowerCase(),
    label,
    emoji: entry.emoji,
    priority: entry.priority,
    keywords: entry.keywords,
    sectionName: entry.emoji ? `${entry.emoji} ${label}` : label,
  };
}

export class Taxonomy {
  private readonly categories: Category[];
  private readonly byKeyMap = new Map<string, Category>();
  private readonly lookup = new Map<string, Category>();
  private readonly sectionMap = new Map<string, Category>();
  private readonly fallbackCategory: Category;

  constructor(categories: Category[]) {
    const seenPriorities = new Map<number, string>();
    for (const category of categories) {
      if (this.byKeyMap.has(category.key)) {
        throw new ConfigError(`Duplicate category key "${category.key}"`);
      }
      const clash = seenPriorities.get(category.priority);
      if (clash !== undefined) {
        throw new ConfigError(
          `Categories "${clash}" and "${category.key}" share priority ${category.priority}`,
        );
      }
      seenPriorities.set(category.priority, category.key);
      this.byKeyMap.set(category.key, category);
    }

    const configured = this.byKeyMap.get(FALLBACK_KEY);
    if (configured) {
      if (categories.some((c) => c.priority > configured.priority)) {
        throw new ConfigError(
          `Category "${FALLBACK_KEY}" is the catch-all and must have the highest priority number`,
        );
      }
      this.fallbackCategory = configured;
    } else {
      const maxPriority = Math.max(-1, ...categories.map((c) => c.priority));
      this.fallbackCategory = toCategory({
        key: FALLBACK_KEY,
        emoji: '📦',
        priority: maxPriority + 1,
        keywords: [],
      });
      this.byKeyMap.set(FALLBACK_KEY, this.fallbackCategory);
    }

    this.categories = [...this.byKeyMap.values()].sort((a, b) => a.priority - b.priority);

    for (const category of this.categories) {
      const sharing = this.sectionMap.get(category.sectionName);
      if (sharing) {
        throw new ConfigError(
          `Categories "${sharing.key}" and "${category.key}" share section name "${category.sectionName}"`,
        );
      }
      this.sectionMap.set(category.sectionName, category);

      for (const alias of [category.key, category.label, category.sectionName]) {
        const normalized = normalizeLabel(alias);
        const owner = this.lookup.get(normalized);
        if (owner && owner !== category) {
          throw new ConfigError(`Category "${category.key}" name "${alias}" clashes with category "${owner.key}"`);
        }
        this.lookup.set(normalized, category);
      }
    }
  }

  get size(): number {
    return this.categories.length;
  }

  ordered(): readonly Category[] {
    return this.categories;
  }

  byKey(key: string): Category | undefined {
    return this.byKeyMap.get(key.toLowerCase());
  }

  bySectionName(name: string): Category | undefined {
    return this.sectionMap.get(name);
  }

  /** Case-insensitive exact match on key, label or section name. */
  resolve(label: string): Category | undefined {
    return this.lookup.get(normalizeLabel(label));
  }

  fallback(): Category {
    return this.fallbackCategory;
  }
}

export function parseTaxonomy(text: string, source = 'categories document'): Taxonomy {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${source}: ${describeError(err)}`, err);
  }

  const result = documentSchema.safeParse(doc);
  if (!result.success) {
    const issues = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }

  const { categories } = result.data;
  let entries: Entry[];
  if (Array.isArray(categories)) {
    entries = categories;
  } else {
    entries = Object.entries(categories).map(([key, value], index) => ({
      key,
      label: value?.label,
      emoji: value?.emoji ?? '',
      priority: value?.priority ?? index,
      keywords: value?.keywords ?? [],
    }));
  }

  return new Taxonomy(entries.map(toCategory));
}

export function loadTaxonomy(filePath: string): Taxonomy {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Categories file not found or unreadable: ${filePath}`, err);
  }
  return parseTaxonomy(text, filePath);
}
