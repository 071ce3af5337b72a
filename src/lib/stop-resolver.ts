/**
 * Stop Resolver
 * Maps a user token (cache position or name) onto a display key.
 */

import type { StopCache } from '../services/stop-cache.js';
import { NotFoundError, OutOfRangeError } from './errors.js';
import { findBestMatch } from './fuzzy.js';
import { isIndexToken, normalize } from './normalize.js';

/** How a token matched: by position, literally, or via the normalized key */
export type StopMatchKind = 'index' | 'exact' | 'normalized';

export interface StopMatch {
  key: string;
  /** Position of the key in the cache */
  index: number;
  match: StopMatchKind;
}

export class StopResolver {
  private cache: StopCache;

  constructor(cache: StopCache) {
    this.cache = cache;
  }

  /**
   * Display key for `token`, or undefined.
   *
   * Digit-only tokens are positions and nothing else; a stop literally named
   * "7" can only be reached through its index. Names match on the normalized
   * key and the first key in cache order wins.
   */
  resolve(token: string): string | undefined {
    return this.resolveMatch(token)?.key;
  }

  resolveMatch(token: string): StopMatch | undefined {
    const trimmed = token.trim();
    const keys = this.cache.keys();

    if (isIndexToken(trimmed)) {
      const index = Number(trimmed);
      const key = this.cache.keyAt(index);
      return key === undefined ? undefined : { key, index, match: 'index' };
    }

    const wanted = normalize(trimmed);
    const index = keys.findIndex((key) => normalize(key) === wanted);
    if (index === -1) {
      return undefined;
    }
    const key = keys[index];
    return { key, index, match: key === trimmed ? 'exact' : 'normalized' };
  }

  /**
   * Like resolveMatch, but failures become errors: OutOfRangeError for
   * positions, NotFoundError (with a spelling hint when one is close) for names.
   */
  require(token: string): StopMatch {
    const found = this.resolveMatch(token);
    if (found) {
      return found;
    }

    const trimmed = token.trim();
    if (isIndexToken(trimmed)) {
      throw new OutOfRangeError(Number(trimmed), this.cache.size);
    }
    throw new NotFoundError(trimmed, this.suggest(trimmed));
  }

  /**
   * Nearest cached key by edit distance on normalized keys
   */
  suggest(token: string): string | undefined {
    const keys = this.cache.keys();
    const normalizedKeys = keys.map(normalize);
    const best = findBestMatch(normalize(token), normalizedKeys, 2);
    if (!best) {
      return undefined;
    }
    return keys[normalizedKeys.indexOf(best.match)];
  }
}
