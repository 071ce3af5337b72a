/**
 * Transport modes
 * Maps the journey planner's mode names onto the filters the CLI offers.
 */

import type { Departure } from '../types/api.js';

export const TRANSPORT_MODES = ['bus', 'metro', 'tram', 'train', 'ferry', 'air'] as const;

export type TransportMode = (typeof TRANSPORT_MODES)[number];

const MODE_ALIASES: Record<string, TransportMode> = {
  rail: 'train',
  regionaltrain: 'train',
  longdistancetrain: 'train',
  airportexpress: 'train',
  coach: 'train',
  water: 'ferry',
  watertransport: 'ferry',
};

/** Background colour per mode (hex) */
export const MODE_COLORS: Record<TransportMode, string> = {
  bus: '#C62828',
  metro: '#EF6C00',
  tram: '#1565C0',
  train: '#003DA5',
  ferry: '#6A1B9A',
  air: '#2E7D32',
};

export const FALLBACK_COLOR = '#3A3A3A';

export function normalizeMode(raw: string): string {
  const mode = raw.toLowerCase();
  return MODE_ALIASES[mode] ?? mode;
}

export function isTransportMode(value: string): value is TransportMode {
  return TRANSPORT_MODES.some((mode) => mode === value);
}

export function modeColor(mode: string): string {
  return isTransportMode(mode) ? MODE_COLORS[mode] : FALLBACK_COLOR;
}

/**
 * Keep departures whose mode is one of `modes`. An empty list means no
 * filtering.
 */
export function filterByModes(departures: Departure[], modes: readonly TransportMode[]): Departure[] {
  if (modes.length === 0) {
    return departures;
  }
  return departures.filter((d) => modes.some((mode) => mode === d.mode));
}
