import type { Taxonomy } from '../taxonomy/taxonomy.js';

const MAX_KEYWORDS = 5;

export const CLASSIFY_SYSTEM_TEMPLATE = `You sort shopping list items into supermarket sections.

Use ONLY these category keys:
{categories}

Rules:
1. Pick exactly one key for the item.
2. Keywords are examples, not an exhaustive list.
3. If nothing fits, answer "{fallback}".

Respond with JSON: { "category": "<key>" }`;

export const CLASSIFY_USER_TEMPLATE = `Which category does this shopping item belong to?

<item>
{item}
</item>`;

export function describeCategories(taxonomy: Taxonomy): string {
  return taxonomy
    .ordered()
    .map((c) => {
      const head = `- ${c.key}: ${c.label}${c.emoji ? ` (${c.emoji})` : ''}`;
      const keywords = c.keywords.slice(0, MAX_KEYWORDS).join(', ');
      return keywords ? `${head} e.g. ${keywords}` : head;
    })
    .join('\n');
}

export function buildSystemPrompt(taxonomy: Taxonomy): string {
  return CLASSIFY_SYSTEM_TEMPLATE
    .replace('{categories}', () => describeCategories(taxonomy))
    .replace('{fallback}', () => taxonomy.fallback().key);
}

export function buildClassifyPrompt(text: string): string {
  return CLASSIFY_USER_TEMPLATE.replace('{item}', () => text.trim());
}
