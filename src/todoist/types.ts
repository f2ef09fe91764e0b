import type { Category } from '../taxonomy/taxonomy.js';

export interface Item {
  id: string;
  content: string;
  sectionId: string | null;
  parentId: string | null;
  /** ISO timestamp; null when the remote did not report one. */
  createdAt: string | null;
  fingerprint: string;
}

export interface Section {
  id: string;
  name: string;
  projectId: string;
}

export interface Project {
  id: string;
  name: string;
}

export interface AddItemOptions {
  sectionId?: string;
  priority?: 1 | 2 | 3 | 4;
  dueString?: string;
}

/**
 * What the sync engine needs from the remote list. Mutations are idempotent:
 * moving an item into the section it already occupies, or deleting an item
 * that is gone, does nothing.
 */
export interface ListClient {
  resolveProject(): Promise<Project>;
  fetchItems(projectId: string, signal?: AbortSignal): Promise<Item[]>;
  listSections(projectId: string, signal?: AbortSignal): Promise<Section[]>;
  ensureSection(projectId: string, category: Category, signal?: AbortSignal): Promise<string>;
  /** Resolves false when the item was already there and no call was made. */
  moveItem(item: Item, sectionId: string, signal?: AbortSignal): Promise<boolean>;
  /** Resolves false when the item no longer existed. */
  deleteItem(itemId: string, signal?: AbortSignal): Promise<boolean>;
  addItem(projectId: string, content: string, options?: AddItemOptions): Promise<Item>;
}
