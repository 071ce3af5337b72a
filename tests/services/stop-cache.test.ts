import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { PersistenceError } from '../../src/lib/errors.js';
import { StopCache } from '../../src/services/stop-cache.js';
import { readCacheFile, stop, tempCacheFile } from '../helpers/fakes.js';

describe('StopCache', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    ({ dir, file } = tempCacheFile());
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should start empty without a file', () => {
      expect(StopCache.load(file).size).toBe(0);
    });

    it('should keep document order', () => {
      fs.writeFileSync(file, JSON.stringify({ storo: stop(1, 'Storo'), 'oslo s': stop(59872, 'Oslo S') }));
      expect(StopCache.load(file).keys()).toEqual(['storo', 'oslo s']);
    });

    it('should start empty on invalid JSON', () => {
      fs.writeFileSync(file, '{ not json');
      expect(StopCache.load(file).size).toBe(0);
    });

    it('should start empty when the document is not an object', () => {
      fs.writeFileSync(file, JSON.stringify([stop(1, 'Storo')]));
      expect(StopCache.load(file).size).toBe(0);
    });

    it('should drop malformed entries and keep the rest', () => {
      fs.writeFileSync(
        file,
        JSON.stringify({ storo: stop(1, 'Storo'), broken: { id: 'NSR:StopPlace:2' }, other: 'text' })
      );
      const cache = StopCache.load(file);
      expect(cache.keys()).toEqual(['storo']);
    });
  });

  describe('entries', () => {
    it('should look up keys by position', () => {
      const cache = new StopCache(file, { a: stop(1, 'A'), b: stop(2, 'B') });
      expect(cache.keyAt(1)).toBe('b');
      expect(cache.keyAt(2)).toBeUndefined();
      expect(cache.keyAt(-1)).toBeUndefined();
      expect(cache.keyAt(0.5)).toBeUndefined();
    });

    it('should find every key holding an id', () => {
      const cache = new StopCache(file, { a: stop(1, 'A'), b: stop(2, 'B'), c: stop(1, 'A') });
      expect(cache.findKeysById('NSR:StopPlace:1')).toEqual(['a', 'c']);
      expect(cache.findKeysById('NSR:StopPlace:9')).toEqual([]);
    });

    it('should move a key in place', () => {
      const cache = new StopCache(file, { a: stop(1, 'A'), b: stop(2, 'B'), c: stop(3, 'C') });
      cache.move('b', 'middle');
      expect(cache.keys()).toEqual(['a', 'middle', 'c']);
      expect(cache.get('middle')?.id).toBe('NSR:StopPlace:2');
    });

    it('should ignore moves of unknown keys', () => {
      const cache = new StopCache(file, { a: stop(1, 'A') });
      cache.move('zzz', 'b');
      expect(cache.keys()).toEqual(['a']);
    });

    it('should not share records with the caller', () => {
      const record = stop(1, 'A');
      const cache = new StopCache(file);
      cache.insert('a', record);
      record.name = 'Changed';
      expect(cache.get('a')?.name).toBe('A');
    });
  });

  describe('persist', () => {
    it('should write the whole store and create the directory', () => {
      const nested = path.join(dir, 'nested', 'stops.json');
      const cache = new StopCache(nested, { storo: stop(1, 'Storo') });
      cache.persist();

      expect(fs.readFileSync(nested, 'utf-8')).toBe(`${JSON.stringify({ storo: stop(1, 'Storo') }, null, 2)}\n`);
    });

    it('should survive a round trip through load', () => {
      const cache = new StopCache(file, { storo: stop(1, 'Storo'), 'skøyen': stop(6275, 'Skøyen') });
      cache.persist();

      expect(StopCache.load(file).toDocument()).toEqual(readCacheFile(file));
      expect(StopCache.load(file).keys()).toEqual(['storo', 'skøyen']);
    });

    it('should keep a key named __proto__ across a reload', () => {
      const cache = new StopCache(file, [
        ['__proto__', stop(59872, 'Oslo S')],
        ['storo', stop(1, 'Storo')],
      ]);
      cache.persist();

      const loaded = StopCache.load(file);
      expect(loaded.keys()).toEqual(['__proto__', 'storo']);
      expect(loaded.get('__proto__')?.id).toBe('NSR:StopPlace:59872');
    });

    it('should raise PersistenceError when the file cannot be written', () => {
      const blocker = path.join(dir, 'blocker');
      fs.writeFileSync(blocker, '');
      const cache = new StopCache(path.join(blocker, 'stops.json'), { storo: stop(1, 'Storo') });

      expect(() => cache.persist()).toThrow(PersistenceError);
      expect(() => cache.persist()).toThrow(`Could not write cache to ${path.join(blocker, 'stops.json')}`);
    });
  });
});
