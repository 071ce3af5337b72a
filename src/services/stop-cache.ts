/**
 * Stop Cache Service
 * In-memory, insertion-ordered store of saved stops, backed by a JSON file.
 * Loading never fails; writing does, loudly.
 */

import fs from 'node:fs';
import path from 'node:path';
import { PlaceRecordSchema, type PlaceRecord, type StopCacheDocument } from '../types/place.js';
import { PersistenceError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

const logger = loggers.cache;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class StopCache {
  private filePath: string;
  private entries: Map<string, PlaceRecord>;

  constructor(filePath: string, entries: StopCacheDocument | Array<[string, PlaceRecord]> = {}) {
    this.filePath = filePath;
    const pairs = Array.isArray(entries) ? entries : Object.entries(entries);
    this.entries = new Map(pairs.map(([key, record]): [string, PlaceRecord] => [key, { ...record }]));
  }

  /**
   * Read the cache document. A missing, unreadable or malformed file gives an
   * empty cache; malformed entries inside a valid document are dropped.
   */
  static load(filePath: string): StopCache {
    let raw: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        logger.debug('No cache file, starting empty', { url: filePath });
        return new StopCache(filePath);
      }
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      logger.warn('Cache file unreadable, starting empty', {
        url: filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return new StopCache(filePath);
    }

    if (!isPlainObject(raw)) {
      logger.warn('Cache file is not an object, starting empty', { url: filePath });
      return new StopCache(filePath);
    }

    // Pairs, not an object: a key such as "__proto__" must stay an entry
    const entries: Array<[string, PlaceRecord]> = [];
    for (const [key, value] of Object.entries(raw)) {
      const parsed = PlaceRecordSchema.safeParse(value);
      if (parsed.success) {
        entries.push([key, parsed.data]);
      } else {
        logger.warn('Dropping malformed cache entry', { url: filePath, key });
      }
    }

    logger.debug('Cache loaded', { url: filePath, entries: entries.length });
    return new StopCache(filePath, entries);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  list(): Array<[string, PlaceRecord]> {
    return [...this.entries.entries()];
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): PlaceRecord | undefined {
    return this.entries.get(key);
  }

  keyAt(index: number): string | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.size) {
      return undefined;
    }
    return this.keys()[index];
  }

  /** Keys whose stored record has the given remote id, in store order */
  findKeysById(id: string): string[] {
    return this.list()
      .filter(([, record]) => record.id === id)
      .map(([key]) => key);
  }

  /**
   * Insert a copy of `record`. Callers check for collisions first; an
   * existing key would be overwritten in place.
   */
  insert(key: string, record: PlaceRecord): void {
    this.entries.set(key, { ...record });
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Move an entry to a new key, keeping its position */
  move(oldKey: string, newKey: string): void {
    const record = this.entries.get(oldKey);
    if (!record) {
      return;
    }
    this.entries = new Map(
      this.list().map(([key, value]): [string, PlaceRecord] => (key === oldKey ? [newKey, record] : [key, value]))
    );
  }

  clear(): void {
    this.entries.clear();
  }

  toDocument(): StopCacheDocument {
    return Object.fromEntries(this.list().map(([key, record]) => [key, { ...record }]));
  }

  /**
   * Overwrite the cache file with the whole store
   * @throws PersistenceError
   */
  persist(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, `${JSON.stringify(this.toDocument(), null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new PersistenceError(this.filePath, error);
    }
    logger.debug('Cache persisted', { url: this.filePath, entries: this.entries.size });
  }
}
