/**
 * Entur API payloads
 * Only the fields the client reads are modelled.
 */

import { z } from 'zod';

export const GeocoderFeatureSchema = z.object({
  properties: z
    .object({
      id: z.string().optional(),
      name: z.string().optional(),
      county: z.string().optional(),
      label: z.string().optional(),
      layer: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export const GeocoderResponseSchema = z.object({
  features: z.array(GeocoderFeatureSchema).optional(),
});

export const EstimatedCallSchema = z.object({
  expectedDepartureTime: z.string().datetime({ offset: true }),
  destinationDisplay: z
    .object({ frontText: z.string().nullable().optional() })
    .nullable()
    .optional(),
  serviceJourney: z.object({
    line: z.object({
      publicCode: z.string().nullable().optional(),
      name: z.string().nullable().optional(),
      transportMode: z.string().nullable().optional(),
    }),
  }),
});

export type EstimatedCall = z.infer<typeof EstimatedCallSchema>;

export const DeparturesResponseSchema = z.object({
  data: z
    .object({
      stopPlace: z
        .object({
          name: z.string(),
          estimatedCalls: z.array(EstimatedCallSchema).nullable().optional(),
        })
        .nullable()
        .optional(),
    })
    .nullable()
    .optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

/** Departure as the rest of the tool sees it */
export interface Departure {
  /** ISO timestamp exactly as the journey planner sent it */
  time: string;
  /** Public line code, e.g. "31" or "L1" */
  lineCode: string;
  lineName: string;
  /** Normalized transport mode, see lib/transport-mode.ts */
  mode: string;
  destination: string;
}

export interface StopDepartures {
  stopName: string;
  departures: Departure[];
}

export interface DepartureQueryOptions {
  /** Look-ahead window in seconds */
  timeRange?: number;
  numberOfDepartures?: number;
}
