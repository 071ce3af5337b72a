/**
 * Test doubles for the prompt, place search and departure collaborators
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Prompter } from '../../src/lib/prompt.js';
import type { DepartureSource, PlaceSearch } from '../../src/services/api.js';
import type { Departure, StopDepartures } from '../../src/types/api.js';
import type { PlaceRecord } from '../../src/types/place.js';

/**
 * Answers questions from a script, in order, and records what was asked.
 * Running out of answers behaves like closed input.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  async confirm(message: string): Promise<boolean> {
    this.questions.push(message);
    return this.answers.shift() === 'y';
  }

  async choose(message: string, choices: readonly string[]): Promise<string | null> {
    this.questions.push(`${message} [${choices.join('/')}]`);
    const answer = this.answers.shift();
    return answer !== undefined && choices.includes(answer) ? answer : null;
  }

  close(): void {}
}

export class FakeEntur implements PlaceSearch, DepartureSource {
  readonly searches: string[] = [];
  readonly departureRequests: string[] = [];
  places: PlaceRecord[];
  departures: Departure[];
  stopName: string;

  constructor(places: PlaceRecord[] = [], departures: Departure[] = [], stopName = 'Test stop') {
    this.places = places;
    this.departures = departures;
    this.stopName = stopName;
  }

  async searchPlaces(text: string): Promise<PlaceRecord[]> {
    this.searches.push(text);
    return this.places;
  }

  async getDepartures(stopId: string): Promise<StopDepartures> {
    this.departureRequests.push(stopId);
    return { stopName: this.stopName, departures: this.departures };
  }
}

export function stop(id: number, name: string, county = 'Oslo'): PlaceRecord {
  return {
    id: `NSR:StopPlace:${id}`,
    name,
    county,
    label: `${name}, ${county}`,
    layer: 'venue',
    is_stop: true,
  };
}

export function place(id: string, name: string, county = 'Oslo'): PlaceRecord {
  return {
    id,
    name,
    county,
    label: `${name}, ${county}`,
    layer: 'address',
    is_stop: false,
  };
}

export function departure(time: string, lineCode: string, mode: string, destination: string): Departure {
  return { time, lineCode, lineName: `${lineCode} ${destination}`, mode, destination };
}

export function tempCacheFile(): { dir: string; file: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reise-test-'));
  return { dir, file: path.join(dir, 'stops.json') };
}

export function readCacheFile(file: string): Record<string, PlaceRecord> {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}
