import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { CacheMutator } from '../../src/lib/cache-mutator.js';
import { OutOfRangeError } from '../../src/lib/errors.js';
import { StopLookup } from '../../src/lib/stop-lookup.js';
import { StopResolver } from '../../src/lib/stop-resolver.js';
import { StopCache } from '../../src/services/stop-cache.js';
import type { StopCacheDocument } from '../../src/types/place.js';
import { FakeEntur, ScriptedPrompter, place, readCacheFile, stop, tempCacheFile } from '../helpers/fakes.js';

describe('StopLookup', () => {
  let dir: string;
  let file: string;
  let cache: StopCache;
  let prompter: ScriptedPrompter;
  let entur: FakeEntur;
  let printed: string[];

  function setup(document: StopCacheDocument = {}, answers: string[] = []): StopLookup {
    cache = new StopCache(file, document);
    prompter = new ScriptedPrompter(answers);
    const resolver = new StopResolver(cache);
    return new StopLookup({
      cache,
      resolver,
      mutator: new CacheMutator(cache, resolver, prompter),
      search: entur,
      prompter,
      print: (text) => printed.push(text),
      render: { color: false },
    });
  }

  beforeEach(() => {
    ({ dir, file } = tempCacheFile());
    entur = new FakeEntur();
    printed = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('cache hits', () => {
    it('should return an exact key without searching or asking', async () => {
      const lookup = setup({ 'oslo s': stop(59872, 'Oslo S') });
      const outcome = await lookup.lookup('oslo s');

      expect(outcome).toEqual({ status: 'cached', key: 'oslo s', record: stop(59872, 'Oslo S') });
      expect(entur.searches).toEqual([]);
      expect(prompter.questions).toEqual([]);
    });

    it('should resolve digit-only tokens by position', async () => {
      const lookup = setup({ 'oslo s': stop(59872, 'Oslo S'), home: stop(6275, 'Skøyen') });
      const outcome = await lookup.lookup('1');

      expect(outcome).toMatchObject({ status: 'cached', key: 'home' });
      expect(entur.searches).toEqual([]);
    });

    it('should not fall back to a search for a missing index', async () => {
      const lookup = setup({ 'oslo s': stop(59872, 'Oslo S') });

      await expect(lookup.lookup('4')).rejects.toThrow(OutOfRangeError);
      expect(entur.searches).toEqual([]);
    });

    it('should offer the cached entry on a normalized match', async () => {
      const lookup = setup({ 'oslo s': stop(59872, 'Oslo S') }, ['y']);
      const outcome = await lookup.lookup('Oslo-S');

      expect(prompter.questions).toEqual(["'Oslo-S' is already saved as 'oslo s'. Use cached entry?"]);
      expect(outcome).toMatchObject({ status: 'cached', key: 'oslo s' });
      expect(entur.searches).toEqual([]);
    });

    it('should search when the offered entry is declined', async () => {
      entur.places = [stop(59872, 'Oslo S')];
      const lookup = setup({ 'oslo s': stop(59872, 'Oslo S') }, ['n']);
      const outcome = await lookup.lookup('Oslo-S');

      expect(entur.searches).toEqual(['Oslo-S']);
      expect(outcome).toMatchObject({ status: 'reused', key: 'oslo s' });
    });

    it('should skip the cache in raw mode', async () => {
      entur.places = [stop(59872, 'Oslo S')];
      const lookup = setup({ 'oslo s': stop(59872, 'Oslo S') });
      await lookup.lookup('oslo s', { raw: true });

      expect(entur.searches).toEqual(['oslo s']);
      expect(prompter.questions).toEqual([]);
    });
  });

  describe('remote search', () => {
    it('should list hints and report no results when nothing is a stop place', async () => {
      entur.places = [place('KVE:TopographicPlace:1', 'Bergen', 'Vestland'), place('OSM:1', 'Bergen gate')];
      const lookup = setup();
      const outcome = await lookup.lookup('bergen');

      expect(outcome).toEqual({ status: 'no-results', hints: entur.places });
      expect(printed).toEqual([
        "No stop places found for 'bergen'",
        '  Bergen, Vestland',
        '  Bergen gate, Oslo',
      ]);
      expect(fs.existsSync(file)).toBe(false);
    });

    it('should save a single stop place without asking', async () => {
      entur.places = [place('OSM:1', 'Skøyenveien'), stop(6275, 'Skøyen')];
      const lookup = setup();
      const outcome = await lookup.lookup('Skøyen');

      expect(outcome).toEqual({ status: 'saved', key: 'skøyen', record: stop(6275, 'Skøyen') });
      expect(prompter.questions).toEqual([]);
      expect(printed).toEqual(['Saved skøyen -> NSR:StopPlace:6275']);
      expect(readCacheFile(file)).toEqual({ 'skøyen': stop(6275, 'Skøyen') });
    });

    it('should let the user pick among several stop places', async () => {
      entur.places = [place('OSM:1', 'Storoveien'), stop(1, 'Storo'), stop(2, 'Storo', 'Viken')];
      const lookup = setup({}, ['2']);
      const outcome = await lookup.lookup('storo');

      expect(prompter.questions).toEqual(['Pick a stop (or q) [1/2/q]']);
      expect(printed[0].startsWith("Matches for 'storo'\n")).toBe(true);
      expect(printed[0]).toContain('Storoveien');
      expect(outcome).toEqual({ status: 'saved', key: 'storo', record: stop(2, 'Storo', 'Viken') });
    });

    it('should cancel on q without touching the cache', async () => {
      entur.places = [stop(1, 'Storo'), stop(2, 'Storo', 'Viken')];
      const lookup = setup({}, ['q']);
      const outcome = await lookup.lookup('storo');

      expect(outcome).toEqual({ status: 'canceled' });
      expect(printed[printed.length - 1]).toBe('Canceled');
      expect(cache.size).toBe(0);
      expect(fs.existsSync(file)).toBe(false);
    });

    it('should cancel when input ends during the pick', async () => {
      entur.places = [stop(1, 'Storo'), stop(2, 'Storo', 'Viken')];
      const lookup = setup();

      expect(await lookup.lookup('storo')).toEqual({ status: 'canceled' });
    });

    it('should reuse the key already holding the picked id', async () => {
      entur.places = [stop(6275, 'Skøyen')];
      const lookup = setup({ home: stop(6275, 'Skøyen') });
      const outcome = await lookup.lookup('skoyen stasjon');

      expect(outcome).toEqual({ status: 'reused', key: 'home', record: stop(6275, 'Skøyen') });
      expect(printed).toEqual(["Already cached as 'home'"]);
      expect(cache.keys()).toEqual(['home']);
      expect(fs.existsSync(file)).toBe(false);
    });

    it('should show every result and not save when an id sits under several keys', async () => {
      entur.places = [stop(6275, 'Skøyen')];
      const lookup = setup({ home: stop(6275, 'Skøyen'), work: stop(6275, 'Skøyen') }, ['0']);
      const outcome = await lookup.lookup('skoyen stasjon');

      const warning = "'NSR:StopPlace:6275' is cached under several keys ('home', 'work'); not saving";
      expect(prompter.questions).toEqual(['Pick a stop (or q) [0/q]']);
      expect(printed[0]).toBe(warning);
      expect(printed[printed.length - 1]).toBe(warning);
      expect(outcome).toEqual({
        status: 'unsaved',
        record: stop(6275, 'Skøyen'),
        conflicts: ['home', 'work'],
      });
      expect(cache.keys()).toEqual(['home', 'work']);
    });

    it('should warn only once when the ambiguous stop was picked by hand', async () => {
      entur.places = [stop(6275, 'Skøyen'), stop(1, 'Storo')];
      const lookup = setup({ home: stop(6275, 'Skøyen'), work: stop(6275, 'Skøyen') }, ['0']);
      const outcome = await lookup.lookup('s');

      expect(outcome.status).toBe('unsaved');
      expect(prompter.questions).toHaveLength(1);
      expect(printed.filter((line) => line.includes('several keys'))).toHaveLength(1);
    });
  });

  describe('deriveKey', () => {
    it('should use the lower-cased name when free', () => {
      expect(setup().deriveKey(stop(1, 'Oslo S'))).toBe('oslo s');
    });

    it('should add the county when the name is taken', () => {
      const lookup = setup({ storo: stop(1, 'Storo') });
      expect(lookup.deriveKey(stop(2, 'Storo', 'Viken'))).toBe('storo (viken)');
    });

    it('should number the county form when both are taken', () => {
      const lookup = setup({ storo: stop(1, 'Storo'), 'storo (viken)': stop(2, 'Storo', 'Viken') });
      expect(lookup.deriveKey(stop(3, 'Storo', 'Viken'))).toBe('storo (viken) 2');
    });

    it('should treat keys equal after normalization as taken', () => {
      const lookup = setup({ 'oslo s': stop(1, 'Oslo S') });
      expect(lookup.deriveKey(stop(2, 'Oslo-S'))).toBe('oslo-s (oslo)');
    });

    it('should never produce a digit-only key', () => {
      const lookup = setup();
      expect(lookup.deriveKey(stop(1, '123'))).toBe('123 (oslo)');
      expect(lookup.deriveKey(stop(2, '123', ''))).toBe('123 2');
    });
  });
});
