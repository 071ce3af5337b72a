/**
 * Entur API Client
 * Place search (geocoder) and departures (journey planner GraphQL)
 */

import { ofetch } from 'ofetch';
import type { ZodType, ZodTypeDef } from 'zod';
import { RemoteError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { normalizeMode } from '../lib/transport-mode.js';
import { isStopPlaceId, type PlaceRecord } from '../types/place.js';
import {
  DeparturesResponseSchema,
  GeocoderResponseSchema,
  type Departure,
  type DepartureQueryOptions,
  type EstimatedCall,
  type StopDepartures,
} from '../types/api.js';
import { withRetry, type RetryPolicy } from './retry.js';

export const GEOCODER_URL = 'https://api.entur.io/geocoder/v1/autocomplete';
export const JOURNEY_PLANNER_URL = 'https://api.entur.io/journey-planner/v3/graphql';

export const DEFAULT_CLIENT_NAME = 'reise-cli';
export const DEFAULT_TIME_RANGE = 3600;
export const DEFAULT_DEPARTURES = 20;
export const DEFAULT_TIMEOUT_MS = 10000;

const logger = loggers.api;

const DEPARTURES_QUERY = `
  query($id: String!, $timeRange: Int!, $numberOfDepartures: Int!) {
    stopPlace(id: $id) {
      name
      estimatedCalls(timeRange: $timeRange, numberOfDepartures: $numberOfDepartures) {
        expectedDepartureTime
        destinationDisplay { frontText }
        serviceJourney {
          line { publicCode name transportMode }
        }
      }
    }
  }`;

/** Free-text place lookup */
export interface PlaceSearch {
  searchPlaces(text: string): Promise<PlaceRecord[]>;
}

/** Upcoming departures for a stop place id */
export interface DepartureSource {
  getDepartures(stopId: string, options?: DepartureQueryOptions): Promise<StopDepartures>;
}

export interface EnturClientOptions {
  /** ET-Client-Name header value */
  clientName?: string;
  timeoutMs?: number;
  geocoderUrl?: string;
  journeyPlannerUrl?: string;
  retry?: Partial<RetryPolicy>;
  /** Defaults for getDepartures */
  departures?: DepartureQueryOptions;
}

function toDeparture(call: EstimatedCall): Departure {
  const line = call.serviceJourney.line;
  return {
    time: call.expectedDepartureTime,
    lineCode: line.publicCode ?? '',
    lineName: line.name ?? '',
    mode: normalizeMode(line.transportMode ?? 'unknown'),
    destination: call.destinationDisplay?.frontText ?? '',
  };
}

export class EnturApiClient implements PlaceSearch, DepartureSource {
  private clientName: string;
  private timeoutMs: number;
  private geocoderUrl: string;
  private journeyPlannerUrl: string;
  private retryPolicy: Partial<RetryPolicy>;
  private departureDefaults: Required<DepartureQueryOptions>;

  constructor(options: EnturClientOptions = {}) {
    this.clientName = options.clientName ?? DEFAULT_CLIENT_NAME;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.geocoderUrl = options.geocoderUrl ?? GEOCODER_URL;
    this.journeyPlannerUrl = options.journeyPlannerUrl ?? JOURNEY_PLANNER_URL;
    this.retryPolicy = {
      onRetry: (failure, attempt) =>
        logger.warn('Retrying request', { attempt, statusCode: failure.status, reason: failure.reason }),
      ...options.retry,
    };
    this.departureDefaults = {
      timeRange: options.departures?.timeRange ?? DEFAULT_TIME_RANGE,
      numberOfDepartures: options.departures?.numberOfDepartures ?? DEFAULT_DEPARTURES,
    };
  }

  /**
   * Geocoder autocomplete. Every feature becomes a PlaceRecord; is_stop marks
   * the ones in the stop place namespace.
   * @throws RemoteError
   */
  async searchPlaces(text: string): Promise<PlaceRecord[]> {
    const payload = await this.request('Place search', this.geocoderUrl, {
      method: 'GET',
      query: { text },
    });
    const data = this.parse('Place search', GeocoderResponseSchema, payload);

    return (data.features ?? []).map((feature) => {
      const props = feature.properties ?? {};
      const id = props.id ?? '';
      return {
        id,
        name: props.name ?? '',
        county: props.county ?? '',
        label: props.label ?? '',
        layer: props.layer ?? '',
        is_stop: isStopPlaceId(id),
      };
    });
  }

  /**
   * Estimated calls for a stop place
   * @throws RemoteError when the request fails or the stop is unknown
   */
  async getDepartures(stopId: string, options: DepartureQueryOptions = {}): Promise<StopDepartures> {
    const variables = {
      id: stopId,
      timeRange: options.timeRange ?? this.departureDefaults.timeRange,
      numberOfDepartures: options.numberOfDepartures ?? this.departureDefaults.numberOfDepartures,
    };
    const payload = await this.request('Departure fetch', this.journeyPlannerUrl, {
      method: 'POST',
      body: { query: DEPARTURES_QUERY, variables },
    });
    const data = this.parse('Departure fetch', DeparturesResponseSchema, payload);

    const stopPlace = data.data?.stopPlace;
    if (!stopPlace) {
      const reason = data.errors?.[0]?.message;
      throw new RemoteError(
        reason ? `Departure fetch failed: ${reason}` : `No stop place data for '${stopId}'`
      );
    }

    return {
      stopName: stopPlace.name,
      departures: (stopPlace.estimatedCalls ?? []).map(toDeparture),
    };
  }

  /**
   * One logged, retried request. ofetch's own retry is off; withRetry owns
   * the policy and the mapping to RemoteError.
   */
  private request(
    operation: string,
    url: string,
    init: { method: 'GET' | 'POST'; query?: Record<string, string>; body?: Record<string, unknown> }
  ): Promise<unknown> {
    return logger.trackAsync(
      operation,
      () =>
        withRetry(
          operation,
          () =>
            ofetch<unknown>(url, {
              ...init,
              headers: { 'ET-Client-Name': this.clientName },
              timeout: this.timeoutMs,
              retry: 0,
            }),
          this.retryPolicy
        ),
      { url }
    );
  }

  private parse<T>(operation: string, schema: ZodType<T, ZodTypeDef, unknown>, payload: unknown): T {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      logger.warn('Unexpected response shape', { operation, issues: parsed.error.issues.length });
      throw new RemoteError(`${operation} returned an unexpected response`);
    }
    return parsed.data;
  }
}
