import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { StateCorruptError, StatePersistError, describeError } from '../errors.js';

const STATE_VERSION = 1;

const recordSchema = z.object({
  category: z.string().min(1),
  lastSeen: z.string().datetime(),
  processed: z.boolean(),
});

const stateFileSchema = z.object({
  version: z.literal(STATE_VERSION),
  lastSync: z.string().datetime().nullable(),
  records: z.record(z.string(), recordSchema),
});

export type StateRecord = z.infer<typeof recordSchema>;
type StateFile = z.infer<typeof stateFileSchema>;

/**
 * Fingerprint-keyed record of items already placed in a category section.
 *
 * Single writer: one process per state file. Records are only removed through
 * `prune`; nothing expires on its own.
 */
export class StateStore {
  private records = new Map<string, StateRecord>();
  private _lastSync: string | null = null;
  private _loaded = false;

  constructor(readonly filePath: string) {}

  get loaded(): boolean {
    return this._loaded;
  }

  get size(): number {
    return this.records.size;
  }

  get lastSync(): string | null {
    return this._lastSync;
  }

  /** Missing file yields empty state. Anything unreadable throws StateCorruptError. */
  load(): void {
    let data: string;
    try {
      data = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        this.reset();
        return;
      }
      throw new StateCorruptError(`Cannot read state file ${this.filePath}`, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      throw new StateCorruptError(`State file ${this.filePath} is not valid JSON`, err);
    }

    const result = stateFileSchema.safeParse(parsed);
    if (!result.success) {
      const first = result.error.issues[0];
      throw new StateCorruptError(
        `State file ${this.filePath} has an unexpected shape (${first?.path.join('.') ?? ''}: ${first?.message ?? 'invalid'})`,
      );
    }

    this.records = new Map(Object.entries(result.data.records));
    this._lastSync = result.data.lastSync;
    this._loaded = true;
  }

  reset(): void {
    this.records = new Map();
    this._lastSync = null;
    this._loaded = true;
  }

  get(fingerprint: string): StateRecord | undefined {
    return this.records.get(fingerprint);
  }

  upsert(fingerprint: string, record: StateRecord): void {
    this.records.set(fingerprint, { ...record });
  }

  /** Removes every record the predicate selects; returns how many went. */
  prune(predicate: (fingerprint: string, record: StateRecord) => boolean): number {
    let removed = 0;
    for (const [fingerprint, record] of this.records) {
      if (predicate(fingerprint, record)) {
        this.records.delete(fingerprint);
        removed++;
      }
    }
    return removed;
  }

  pruneOlderThan(cutoff: Date): number {
    const cutoffMs = cutoff.getTime();
    return this.prune((_, record) => Date.parse(record.lastSeen) < cutoffMs);
  }

  markSynced(at: Date = new Date()): void {
    this._lastSync = at.toISOString();
  }

  /**
   * Write to a sibling temp file and rename over the target, so a crash
   * mid-write leaves the previous file intact.
   */
  save(): void {
    const snapshot: StateFile = {
      version: STATE_VERSION,
      lastSync: this._lastSync,
      records: Object.fromEntries([...this.records].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))),
    };
    const tempFile = `${this.filePath}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempFile, JSON.stringify(snapshot, null, 2) + '\n', 'utf-8');
      fs.renameSync(tempFile, this.filePath);
    } catch (err) {
      try {
        fs.rmSync(tempFile, { force: true });
      } catch (cleanupErr) {
        throw new StatePersistError(
          `Failed to save state to ${this.filePath} (${describeError(err)}); temp file ${tempFile} left behind: ${describeError(cleanupErr)}`,
          err,
        );
      }
      throw new StatePersistError(`Failed to save state to ${this.filePath}: ${describeError(err)}`, err);
    }
  }
}
