import { TodoistApi } from '@doist/todoist-api-typescript';
import { z } from 'zod';
import { getConfig } from '../config.js';
import {
  RemoteAuthError,
  RemoteNotFoundError,
  RemoteRequestError,
  RemoteTransientError,
  describeError,
  httpStatusOf,
} from '../errors.js';
import { getLogger, type Logger } from '../logger.js';
import { AbortedError, BackoffPolicy, RetryExhaustedError } from '../retry/backoff.js';
import { fingerprint } from '../sync/fingerprint.js';
import type { Category } from '../taxonomy/taxonomy.js';
import type { AddItemOptions, Item, ListClient, Project, Section } from './types.js';

const TRANSIENT_STATUS = new Set([408, 429]);
const AUTH_STATUS = new Set([401, 403]);
const PAGE_LIMIT = 200;

const projectSchema = z.object({ id: z.string(), name: z.string() });

const sectionSchema = z.object({ id: z.string(), name: z.string(), projectId: z.string() });

const taskSchema = z.object({
  id: z.string(),
  content: z.string(),
  sectionId: z.string().nullish(),
  parentId: z.string().nullish(),
  addedAt: z.string().nullish(),
  createdAt: z.string().nullish(),
  checked: z.boolean().optional(),
  isCompleted: z.boolean().optional(),
});

interface Page<T> {
  results: T[];
  nextCursor: string | null;
}

export function isTransientRemoteError(err: unknown): boolean {
  if (err instanceof AbortedError) return false;
  const status = httpStatusOf(err);
  if (status === undefined) return true;
  return TRANSIENT_STATUS.has(status) || status >= 500;
}

export function translateRemoteError(err: unknown, operation: string): Error {
  if (err instanceof AbortedError) return err;
  if (err instanceof RetryExhaustedError) {
    return new RemoteTransientError(
      `${operation} failed after ${err.attempts} attempt(s): ${describeError(err.lastError)}`,
      err.lastError,
    );
  }
  const status = httpStatusOf(err);
  if (status !== undefined && AUTH_STATUS.has(status)) {
    return new RemoteAuthError(`${operation}: Todoist rejected credentials (status ${status})`, err);
  }
  if (status === 404) {
    return new RemoteNotFoundError(`${operation}: not found`, err);
  }
  if (isTransientRemoteError(err)) {
    return new RemoteTransientError(`${operation} failed: ${describeError(err)}`, err);
  }
  return new RemoteRequestError(`${operation} failed (status ${status ?? 'unknown'}): ${describeError(err)}`, err);
}

function toItem(raw: unknown): Item | null {
  const result = taskSchema.safeParse(raw);
  if (!result.success) return null;
  const task = result.data;
  return {
    id: task.id,
    content: task.content,
    sectionId: task.sectionId ?? null,
    parentId: task.parentId ?? null,
    createdAt: task.addedAt ?? task.createdAt ?? null,
    fingerprint: fingerprint(task.content),
  };
}

export interface TodoistListClientOptions {
  apiToken?: string;
  projectId?: string;
  projectName?: string;
  backoff?: BackoffPolicy;
  logger?: Logger;
}

export class TodoistListClient implements ListClient {
  private api: TodoistApi;
  private projectId?: string;
  private projectName: string;
  private backoff: BackoffPolicy;
  private logger: Logger;
  /** projectId -> section name -> section id, refreshed by listSections */
  private sectionCache = new Map<string, Map<string, string>>();

  constructor(options?: TodoistListClientOptions) {
    const config = getConfig();
    this.api = new TodoistApi(options?.apiToken ?? config.todoistApiKey);
    this.projectId = options?.projectId ?? config.shoppingProjectId;
    this.projectName = options?.projectName ?? config.shoppingProjectName;
    this.logger = options?.logger ?? getLogger();
    this.backoff = (
      options?.backoff ??
      new BackoffPolicy({ maxAttempts: config.retryMaxAttempts, baseDelayMs: config.retryBaseDelayMs })
    ).with({
      isRetryable: isTransientRemoteError,
      onRetry: (err, attempt, delay) =>
        this.logger.warn(
          `Todoist call failed (attempt ${attempt}, status ${httpStatusOf(err) ?? 'none'}). Retrying in ${delay}ms...`,
        ),
    });
  }

  async resolveProject(): Promise<Project> {
    const projects = (await this.collect('List projects', (cursor) =>
      this.api.getProjects({ limit: PAGE_LIMIT, ...(cursor ? { cursor } : {}) }),
    )).flatMap((raw) => {
      const parsed = projectSchema.safeParse(raw);
      return parsed.success ? [parsed.data] : [];
    });

    if (this.projectId) {
      const byId = projects.find((p) => p.id === this.projectId);
      if (byId) return byId;
      this.logger.warn(`Project ID ${this.projectId} not found, falling back to name search`);
    }

    const wanted = this.projectName.toLowerCase();
    const byName = projects.find((p) => p.name.toLowerCase() === wanted);
    if (!byName) {
      throw new RemoteNotFoundError(`Shopping list project "${this.projectName}" not found`);
    }
    return byName;
  }

  async fetchItems(projectId: string, signal?: AbortSignal): Promise<Item[]> {
    const tasks = await this.collect(
      'Fetch items',
      (cursor) => this.api.getTasks({ projectId, limit: PAGE_LIMIT, ...(cursor ? { cursor } : {}) }),
      signal,
    );

    const items: Item[] = [];
    for (const raw of tasks) {
      const parsed = taskSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(`Skipping malformed task payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        continue;
      }
      if (parsed.data.checked || parsed.data.isCompleted || parsed.data.parentId) continue;
      const item = toItem(parsed.data);
      if (item && item.fingerprint) items.push(item);
    }
    return items;
  }

  async listSections(projectId: string, signal?: AbortSignal): Promise<Section[]> {
    const raw = await this.collect(
      'List sections',
      (cursor) => this.api.getSections({ projectId, limit: PAGE_LIMIT, ...(cursor ? { cursor } : {}) }),
      signal,
    );
    const sections = raw.flatMap((s) => {
      const parsed = sectionSchema.safeParse(s);
      return parsed.success ? [parsed.data] : [];
    });

    const byName = new Map<string, string>();
    for (const section of sections) {
      if (!byName.has(section.name)) byName.set(section.name, section.id);
    }
    this.sectionCache.set(projectId, byName);
    return sections;
  }

  async ensureSection(projectId: string, category: Category, signal?: AbortSignal): Promise<string> {
    if (!this.sectionCache.has(projectId)) {
      await this.listSections(projectId, signal);
    }
    const known = this.sectionCache.get(projectId);
    const existing = known?.get(category.sectionName);
    if (existing) return existing;

    this.logger.info(`Section "${category.sectionName}" not found, creating it...`);
    const created = sectionSchema.safeParse(
      await this.call(
        `Create section "${category.sectionName}"`,
        () => this.api.addSection({ name: category.sectionName, projectId }),
        signal,
      ),
    );
    if (!created.success) {
      throw new RemoteRequestError(`Create section "${category.sectionName}": unexpected response payload`);
    }
    known?.set(created.data.name, created.data.id);
    return created.data.id;
  }

  async moveItem(item: Item, sectionId: string, signal?: AbortSignal): Promise<boolean> {
    if (item.sectionId === sectionId) return false;
    await this.call(
      `Move item ${item.id}`,
      () => this.api.moveTasks([item.id], { sectionId }),
      signal,
    );
    return true;
  }

  async deleteItem(itemId: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.call(`Delete item ${itemId}`, () => this.api.deleteTask(itemId), signal);
      return true;
    } catch (err) {
      if (err instanceof RemoteNotFoundError) return false;
      throw err;
    }
  }

  async addItem(projectId: string, content: string, options: AddItemOptions = {}): Promise<Item> {
    const raw = await this.call('Add item', () =>
      this.api.addTask({
        content,
        projectId,
        ...(options.sectionId ? { sectionId: options.sectionId } : {}),
        ...(options.priority ? { priority: options.priority } : {}),
        ...(options.dueString ? { dueString: options.dueString } : {}),
      }),
    );
    const item = toItem(raw);
    if (!item) throw new RemoteRequestError('Add item: Todoist returned an unexpected task payload');
    return item;
  }

  private async call<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await this.backoff.execute(fn, signal);
    } catch (err) {
      throw translateRemoteError(err, operation);
    }
  }

  private async collect<T>(
    operation: string,
    fetchPage: (cursor: string | null) => Promise<Page<T>>,
    signal?: AbortSignal,
  ): Promise<T[]> {
    const all: T[] = [];
    let cursor: string | null = null;
    do {
      const page: Page<T> = await this.call(operation, () => fetchPage(cursor), signal);
      all.push(...page.results);
      cursor = page.nextCursor;
    } while (cursor);
    return all;
  }
}
