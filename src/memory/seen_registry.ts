/**
 * Seen-Event Registry
 *
 * Append-only record of events the pipeline has already acted on. Once an id
 * is here it is never selected again. Storage is injected: a JSON file in
 * production, memory in tests.
 *
 * A single process needs no lock (cycles run one at a time). Processes that
 * share one file must serialise access themselves.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { RegistryPersistError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

export interface SeenRegistryEntry {
  eventId: string;
  markedAt: string | null;
}

export class SeenStoreCorruptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SeenStoreCorruptError';
  }
}

export interface SeenEventStore {
  /** Returns [] when nothing has been stored yet; throws SeenStoreCorruptError on bad data. */
  read(): SeenRegistryEntry[];
  /** Replaces the stored set. Implementations must not leave a partial write behind. */
  write(entries: SeenRegistryEntry[]): void;
}

export function decodeSeenEntries(raw: unknown): SeenRegistryEntry[] {
  if (Array.isArray(raw)) {
    return raw
      .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
      .map((item) => String(item).trim())
      .filter((id) => id.length > 0)
      .map((eventId) => ({ eventId, markedAt: null }));
  }
  if (typeof raw === 'object' && raw !== null) {
    const entries: SeenRegistryEntry[] = [];
    for (const [eventId, value] of Object.entries(raw)) {
      if (!value || !eventId.trim()) continue;
      entries.push({ eventId: eventId.trim(), markedAt: typeof value === 'string' ? value : null });
    }
    return entries;
  }
  throw new SeenStoreCorruptError('Seen-event store must be a JSON array or object');
}

export function encodeSeenEntries(entries: SeenRegistryEntry[]): string {
  const sorted = [...entries].sort((a, b) => (a.eventId < b.eventId ? -1 : a.eventId > b.eventId ? 1 : 0));
  const out: Record<string, string | true> = {};
  for (const entry of sorted) {
    out[entry.eventId] = entry.markedAt ?? true;
  }
  return `${JSON.stringify(out, null, 2)}\n`;
}

export class FileSeenEventStore implements SeenEventStore {
  /** Set when an existing file could be neither read nor copied aside. */
  private unreadable: string | null = null;

  constructor(private readonly path: string) {}

  read(): SeenRegistryEntry[] {
    if (!existsSync(this.path)) {
      return [];
    }
    try {
      return decodeSeenEntries(JSON.parse(readFileSync(this.path, 'utf8')));
    } catch (err) {
      const message = `Seen-event store ${this.path} is unreadable: ${errorMessage(err)}`;
      const copy = this.preserveCorrupt();
      if (!copy.kept) {
        this.unreadable = message;
      }
      throw new SeenStoreCorruptError(`${message} (${copy.note})`);
    }
  }

  write(entries: SeenRegistryEntry[]): void {
    if (this.unreadable) {
      throw new SeenStoreCorruptError(`Refusing to overwrite ${this.path}: ${this.unreadable}`);
    }
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      writeFileSync(tmp, encodeSeenEntries(entries), { encoding: 'utf8' });
      renameSync(tmp, this.path);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw err;
    }
  }

  private preserveCorrupt(): { kept: boolean; note: string } {
    const target = `${this.path}.corrupt`;
    try {
      copyFileSync(this.path, target);
      return { kept: true, note: `copy kept at ${target}` };
    } catch (err) {
      return { kept: false, note: `could not copy aside: ${errorMessage(err)}` };
    }
  }
}

export class MemorySeenEventStore implements SeenEventStore {
  private entries: SeenRegistryEntry[];
  writes = 0;

  constructor(initial: SeenRegistryEntry[] = []) {
    this.entries = initial.map((entry) => ({ ...entry }));
  }

  read(): SeenRegistryEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  write(entries: SeenRegistryEntry[]): void {
    this.entries = entries.map((entry) => ({ ...entry }));
    this.writes += 1;
  }
}

export class SeenEventRegistry {
  private entriesById = new Map<string, SeenRegistryEntry>();
  private loaded = false;

  constructor(
    private readonly store: SeenEventStore,
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Read the persisted set. A missing or corrupt store yields an empty
   * registry and a warning, never an exception. A store that could not be
   * read is not overwritten by later marks.
   */
  load(): number {
    this.entriesById.clear();
    try {
      for (const entry of this.store.read()) {
        if (!this.entriesById.has(entry.eventId)) {
          this.entriesById.set(entry.eventId, entry);
        }
      }
    } catch (err) {
      this.logger?.warn('Seen-event store could not be read; starting empty', {
        error: errorMessage(err),
      });
      this.entriesById.clear();
    }
    this.loaded = true;
    return this.entriesById.size;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  contains(eventId: string): boolean {
    return this.entriesById.has(eventId);
  }

  get size(): number {
    return this.entriesById.size;
  }

  entries(): SeenRegistryEntry[] {
    return [...this.entriesById.values()].map((entry) => ({ ...entry }));
  }

  /**
   * Idempotent. Returns false when the id was already present. The id stays in
   * memory even if persisting fails, so this process will not act on it again.
   */
  markSeen(eventId: string): boolean {
    const id = eventId.trim();
    if (!id) {
      throw new Error('Cannot mark an empty event id as seen');
    }
    if (this.entriesById.has(id)) {
      return false;
    }
    this.entriesById.set(id, { eventId: id, markedAt: this.now().toISOString() });
    try {
      this.store.write(this.entries());
    } catch (err) {
      throw new RegistryPersistError(`Failed to persist seen event ${id}: ${errorMessage(err)}`, id, {
        cause: err,
      });
    }
    this.logger?.debug(`Marked event ${id} as seen`, { total: this.entriesById.size });
    return true;
  }
}
