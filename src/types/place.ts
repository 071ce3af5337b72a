/**
 * Place and cache data structures
 */

import { z } from 'zod';

/** Id prefix of the Norwegian national stop register's stop places */
export const STOP_PLACE_PREFIX = 'NSR:StopPlace:';

/**
 * One place returned by the geocoder. Also the value stored in the stop cache,
 * which is why the field names follow the persisted document.
 */
export const PlaceRecordSchema = z.object({
  /** Stable remote id, e.g. "NSR:StopPlace:59872" */
  id: z.string(),
  name: z.string(),
  county: z.string(),
  /** Full human readable description, e.g. "Oslo S, Oslo" */
  label: z.string(),
  /** Geocoder category, e.g. "venue" or "address" */
  layer: z.string(),
  is_stop: z.boolean(),
});

export type PlaceRecord = z.infer<typeof PlaceRecordSchema>;

/** Display key → place, in insertion order */
export type StopCacheDocument = Record<string, PlaceRecord>;

export function isStopPlaceId(id: string): boolean {
  return id.startsWith(STOP_PLACE_PREFIX);
}
