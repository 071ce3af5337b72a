/**
 * Stop Lookup
 * Turns what the user typed into one stop place: cache first, then the
 * geocoder with an interactive pick when several stops match. New picks are
 * saved so the next lookup stays local.
 */

import type { StopCache } from '../services/stop-cache.js';
import type { PlaceSearch } from '../services/api.js';
import type { PlaceRecord } from '../types/place.js';
import type { CacheMutator } from './cache-mutator.js';
import type { Prompter } from './prompt.js';
import type { StopResolver } from './stop-resolver.js';
import { isIndexToken, normalize } from './normalize.js';
import { renderMatches, type RenderOptions } from './output-formatter.js';
import { loggers } from './logger.js';

const logger = loggers.cli;

/** Labels shown when a search finds places but no stop places */
export const MAX_HINTS = 5;

export type LookupOutcome =
  | { status: 'cached'; key: string; record: PlaceRecord }
  | { status: 'reused'; key: string; record: PlaceRecord }
  | { status: 'saved'; key: string; record: PlaceRecord }
  /** Picked, but the cache already holds this id under several keys */
  | { status: 'unsaved'; record: PlaceRecord; conflicts: string[] }
  | { status: 'no-results'; hints: PlaceRecord[] }
  | { status: 'canceled' };

export interface LookupOptions {
  /** Skip the cache and always search */
  raw?: boolean;
}

export interface StopLookupDeps {
  cache: StopCache;
  resolver: StopResolver;
  mutator: CacheMutator;
  search: PlaceSearch;
  prompter: Prompter;
  print?: (text: string) => void;
  render?: RenderOptions;
}

export class StopLookup {
  private cache: StopCache;
  private resolver: StopResolver;
  private mutator: CacheMutator;
  private search: PlaceSearch;
  private prompter: Prompter;
  private print: (text: string) => void;
  private render: RenderOptions;

  constructor(deps: StopLookupDeps) {
    this.cache = deps.cache;
    this.resolver = deps.resolver;
    this.mutator = deps.mutator;
    this.search = deps.search;
    this.prompter = deps.prompter;
    this.print = deps.print ?? ((text) => console.log(text));
    this.render = deps.render ?? {};
  }

  /**
   * @throws OutOfRangeError for a digit-only token past the end of the cache
   *   (there is no remote fallback for indices), RemoteError when the search
   *   fails, PersistenceError when saving fails
   */
  async lookup(name: string, options: LookupOptions = {}): Promise<LookupOutcome> {
    const token = name.trim();

    if (isIndexToken(token)) {
      return this.cached(this.resolver.require(token).key);
    }

    if (!options.raw) {
      const found = this.resolver.resolveMatch(token);
      if (found?.match === 'exact') {
        return this.cached(found.key);
      }
      if (found && (await this.prompter.confirm(`'${token}' is already saved as '${found.key}'. Use cached entry?`))) {
        return this.cached(found.key);
      }
    }

    return this.searchRemote(token);
  }

  private cached(key: string): LookupOutcome {
    const record = this.cache.get(key);
    if (!record) {
      // Resolver only hands out keys present in the cache
      throw new Error(`Cache entry '${key}' vanished`);
    }
    return { status: 'cached', key, record };
  }

  private async searchRemote(query: string): Promise<LookupOutcome> {
    const places = await this.search.searchPlaces(query);
    const stops = places.filter((place) => place.is_stop);
    logger.debug('Place search finished', { query, results: places.length, stops: stops.length });

    if (stops.length === 0) {
      const hints = places.slice(0, MAX_HINTS);
      this.print(`No stop places found for '${query}'`);
      for (const hint of hints) {
        this.print(`  ${hint.label}`);
      }
      return { status: 'no-results', hints };
    }

    let prompted = false;
    let chosen: PlaceRecord | null = stops.length === 1 ? stops[0] : null;
    if (!chosen) {
      chosen = await this.pick(query, places);
      prompted = true;
    }
    if (!chosen) {
      this.print('Canceled');
      return { status: 'canceled' };
    }

    let existing = this.cache.findKeysById(chosen.id);
    if (existing.length > 1 && !prompted) {
      // Several keys already share this id; let the user see every result
      // instead of silently picking one of them.
      this.warnAmbiguous(chosen, existing);
      chosen = await this.pick(query, places);
      if (!chosen) {
        this.print('Canceled');
        return { status: 'canceled' };
      }
      existing = this.cache.findKeysById(chosen.id);
    }

    if (existing.length > 1) {
      this.warnAmbiguous(chosen, existing);
      return { status: 'unsaved', record: chosen, conflicts: existing };
    }

    if (existing.length === 1) {
      const key = existing[0];
      this.print(`Already cached as '${key}'`);
      return { status: 'reused', key, record: chosen };
    }

    const key = this.deriveKey(chosen);
    this.mutator.save(key, chosen);
    this.print(`Saved ${key} -> ${chosen.id}`);
    return { status: 'saved', key, record: chosen };
  }

  /**
   * Show every result and let the user pick one of the stop places
   * @returns null when the user quits
   */
  private async pick(query: string, places: PlaceRecord[]): Promise<PlaceRecord | null> {
    this.print(renderMatches(query, places, this.render));

    const choices = places.flatMap((place, index) => (place.is_stop ? [String(index)] : []));
    const answer = await this.prompter.choose('Pick a stop (or q)', [...choices, 'q']);
    if (answer === null || answer === 'q') {
      return null;
    }
    return places[Number(answer)] ?? null;
  }

  private warnAmbiguous(record: PlaceRecord, keys: string[]): void {
    this.print(`'${record.id}' is cached under several keys (${keys.map((k) => `'${k}'`).join(', ')}); not saving`);
  }

  /**
   * Lower-cased name, then "name (county)", then numbered. Skips keys taken
   * literally or by normalized form, and digit-only keys.
   */
  deriveKey(record: PlaceRecord): string {
    const taken = new Set(this.cache.keys().map(normalize));
    const free = (key: string): boolean => key.length > 0 && !isIndexToken(key) && !taken.has(normalize(key));

    const base = record.name.trim().toLowerCase() || record.id.toLowerCase();
    const county = record.county.trim().toLowerCase();
    const candidates = county ? [base, `${base} (${county})`] : [base];

    for (const candidate of candidates) {
      if (free(candidate)) {
        return candidate;
      }
    }

    const stem = candidates[candidates.length - 1];
    for (let n = 2; ; n++) {
      const candidate = `${stem} ${n}`;
      if (free(candidate)) {
        return candidate;
      }
    }
  }
}
