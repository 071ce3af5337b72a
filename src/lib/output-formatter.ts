/**
 * Output Formatter
 * Tables for saved stops, search matches and departures; json | table
 */

import Table from 'cli-table3';
import type { PlaceRecord } from '../types/place.js';
import type { Departure } from '../types/api.js';
import { modeColor } from './transport-mode.js';
import { formatClockTime } from './time-utils.js';

export type OutputFormat = 'json' | 'table';

export interface RenderOptions {
  /** ANSI colours for headers and line badges */
  color?: boolean;
}

/** Fields shown by `--info`, in display order */
export const INFO_FIELDS = ['id', 'name', 'label', 'county', 'layer', 'is_stop'] as const;

/**
 * Print `data` as JSON, or run the table renderer
 */
export function outputData(data: unknown, format: OutputFormat, tableRenderer: () => string): void {
  if (format === 'json') {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(tableRenderer());
  }
}

function createTable(head: string[], options: RenderOptions, colAligns?: Array<'left' | 'right'>) {
  return new Table({
    head,
    // cli-table3 reads colAligns by index; an explicit undefined breaks it
    ...(colAligns ? { colAligns } : {}),
    style: options.color ? { head: ['magenta'], border: ['grey'] } : { head: [], border: [] },
  });
}

function hexToRgb(hex: string): [number, number, number] {
  const value = parseInt(hex.replace('#', ''), 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

/**
 * Line code as a badge in its mode's colour: white text, padded to two
 * columns so single-digit lines align.
 */
export function formatLineBadge(lineCode: string, mode: string, color: boolean): string {
  const text = ` ${lineCode.padStart(2)} `;
  if (!color) {
    return text;
  }
  const [r, g, b] = hexToRgb(modeColor(mode));
  return `\x1b[97;48;2;${r};${g};${b}m${text}\x1b[0m`;
}

export function renderStopList(entries: Array<[string, PlaceRecord]>, options: RenderOptions = {}): string {
  const table = createTable(['#', 'Key', 'Stop ID'], options, ['right', 'left', 'left']);
  entries.forEach(([key, record], index) => {
    table.push([String(index), key, record.id]);
  });
  return `Saved stops\n${table.toString()}`;
}

export function renderStopInfo(key: string, record: PlaceRecord, options: RenderOptions = {}): string {
  const table = createTable(['Field', 'Value'], options);
  for (const field of INFO_FIELDS) {
    table.push([field, String(record[field])]);
  }
  return `Info for "${key}"\n${table.toString()}`;
}

/**
 * Every search result with its index; only stop places can be picked, the
 * rest are listed for context.
 */
export function renderMatches(query: string, places: PlaceRecord[], options: RenderOptions = {}): string {
  const table = createTable(['#', 'Name', 'County', 'Label', 'Stop'], options, [
    'right',
    'left',
    'left',
    'left',
    'left',
  ]);
  places.forEach((place, index) => {
    table.push([String(index), place.name, place.county, place.label, place.is_stop ? 'yes' : '-']);
  });
  return `Matches for '${query}'\n${table.toString()}`;
}

export function renderDepartures(stopName: string, departures: Departure[], options: RenderOptions = {}): string {
  const table = createTable(['Time', 'Line', 'Destination'], options, ['right', 'right', 'left']);
  for (const departure of departures) {
    table.push([
      formatClockTime(departure.time),
      formatLineBadge(departure.lineCode, departure.mode, options.color === true),
      departure.destination,
    ]);
  }
  return `Departures from ${stopName}\n${table.toString()}`;
}
