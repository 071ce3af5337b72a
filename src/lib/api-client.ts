/**
 * API Client Helper
 * Builds the EnturApiClient from configuration
 */

import { EnturApiClient } from '../services/api.js';
import type { ConfigService } from '../services/config.js';

export function createApiClient(config: ConfigService): EnturApiClient {
  return new EnturApiClient({
    clientName: config.getClientName(),
    timeoutMs: config.getTimeoutMs(),
    departures: {
      timeRange: config.getTimeRange(),
      numberOfDepartures: config.getDepartureCount(),
    },
  });
}
