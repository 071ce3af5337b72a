/**
 * Cache Mutator
 * Save, rename, delete and clear on the stop cache. Each successful
 * operation persists the whole store once.
 */

import type { StopCache } from '../services/stop-cache.js';
import type { PlaceRecord } from '../types/place.js';
import { CollisionError, InvalidSyntaxError, OutOfRangeError } from './errors.js';
import { loggers } from './logger.js';
import { isIndexToken, normalize } from './normalize.js';
import type { Prompter } from './prompt.js';
import type { StopResolver } from './stop-resolver.js';

const logger = loggers.cache;

/** Token separating the old and new name in a rename */
export const RENAME_SEPARATOR = ':';

export type DeleteOutcome =
  | { status: 'deleted'; key: string }
  | { status: 'canceled'; key: string };

export interface BatchDeleteOutcome {
  /** Keys actually removed, in the order they were removed */
  deleted: string[];
  /** Indices that did not exist, one error each */
  failures: OutOfRangeError[];
  canceled: boolean;
}

export type ClearOutcome =
  | { status: 'cleared'; count: number }
  | { status: 'empty' }
  | { status: 'canceled'; count: number };

export interface RenameOutcome {
  from: string;
  to: string;
}

/**
 * Split rename arguments at the standalone ":" token.
 * @throws InvalidSyntaxError when the separator or either side is missing
 */
export function parseRenameTokens(tokens: string[]): { oldName: string; newName: string } {
  const sep = tokens.indexOf(RENAME_SEPARATOR);
  if (sep === -1) {
    throw new InvalidSyntaxError(`Rename requires '${RENAME_SEPARATOR}' separator`, {
      hint: 'Example: reise -n oslo bussterminal : obterm',
    });
  }

  const oldName = tokens.slice(0, sep).join(' ').trim();
  const newName = tokens.slice(sep + 1).join(' ').trim();
  if (!oldName || !newName) {
    throw new InvalidSyntaxError('Invalid rename syntax', {
      hint: 'Both sides of the separator need a name: reise -n <old> : <new>',
    });
  }

  return { oldName, newName };
}

export class CacheMutator {
  private cache: StopCache;
  private resolver: StopResolver;
  private prompter: Prompter;

  constructor(cache: StopCache, resolver: StopResolver, prompter: Prompter) {
    this.cache = cache;
    this.resolver = resolver;
    this.prompter = prompter;
  }

  /**
   * Store `record` under a new key
   * @throws CollisionError if the key is taken
   */
  save(key: string, record: PlaceRecord): void {
    if (this.cache.has(key)) {
      throw new CollisionError(key);
    }
    this.cache.insert(key, record);
    this.cache.persist();
    logger.info('Saved stop', { key, id: record.id });
  }

  /**
   * Delete the entry a name (or single index) resolves to
   * @throws NotFoundError | OutOfRangeError
   */
  async deleteByName(token: string, force: boolean): Promise<DeleteOutcome> {
    const { key } = this.resolver.require(token);

    if (!force && !(await this.prompter.confirm(`Delete '${key}'?`))) {
      return { status: 'canceled', key };
    }

    this.cache.remove(key);
    this.cache.persist();
    logger.info('Deleted stop', { key });
    return { status: 'deleted', key };
  }

  /**
   * Delete several entries by position. Positions refer to the cache as it
   * was before the batch; removal runs from the highest index down.
   * Missing indices are collected, not thrown.
   */
  async deleteByIndices(tokens: string[], force: boolean): Promise<BatchDeleteOutcome> {
    const indices = [...new Set(tokens.map((token) => Number(token.trim())))].sort((a, b) => b - a);
    const failures: OutOfRangeError[] = [];
    const targets: string[] = [];

    for (const index of indices) {
      const key = this.cache.keyAt(index);
      if (key === undefined) {
        failures.push(new OutOfRangeError(index, this.cache.size));
      } else {
        targets.push(key);
      }
    }
    // Report missing indices lowest first
    failures.reverse();

    if (targets.length === 0) {
      return { deleted: [], failures, canceled: false };
    }

    if (!force) {
      const names = targets.map((key) => `'${key}'`).join(', ');
      const noun = targets.length === 1 ? 'entry' : 'entries';
      if (!(await this.prompter.confirm(`Delete ${targets.length} ${noun} (${names})?`))) {
        return { deleted: [], failures, canceled: true };
      }
    }

    for (const key of targets) {
      this.cache.remove(key);
    }
    this.cache.persist();
    logger.info('Deleted stops by index', { keys: targets });
    return { deleted: targets, failures, canceled: false };
  }

  /**
   * Move an entry to a new display key
   * @throws InvalidSyntaxError | NotFoundError | OutOfRangeError | CollisionError
   */
  rename(oldName: string, newName: string): RenameOutcome {
    const from = oldName.trim();
    const to = newName.trim();
    if (!from || !to) {
      throw new InvalidSyntaxError('Invalid rename syntax');
    }
    if (isIndexToken(to)) {
      throw new InvalidSyntaxError(`'${to}' would be read as a cache index`, {
        hint: 'Pick a name that is not only digits',
      });
    }

    const { key } = this.resolver.require(from);

    if (this.cache.has(to)) {
      throw new CollisionError(to);
    }
    const wanted = normalize(to);
    const clash = this.cache.keys().find((existing) => existing !== key && normalize(existing) === wanted);
    if (clash !== undefined) {
      throw new CollisionError(to, clash);
    }

    this.cache.move(key, to);
    this.cache.persist();
    logger.info('Renamed stop', { from: key, to });
    return { from: key, to };
  }

  /**
   * Remove every entry. An empty cache is left alone without asking.
   */
  async clear(force: boolean): Promise<ClearOutcome> {
    const count = this.cache.size;
    if (count === 0) {
      return { status: 'empty' };
    }

    if (!force) {
      const noun = count === 1 ? 'entry' : 'entries';
      if (!(await this.prompter.confirm(`Clear ALL ${count} cached ${noun}?`))) {
        return { status: 'canceled', count };
      }
    }

    this.cache.clear();
    this.cache.persist();
    logger.info('Cleared cache', { count });
    return { status: 'cleared', count };
  }
}
