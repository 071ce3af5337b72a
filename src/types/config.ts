/**
 * Config file structure
 * Every field can also be set through the environment, which wins.
 */
export interface AppConfig {
  /** Path of the stop cache document */
  cacheFile?: string;
  /** Value of the ET-Client-Name header */
  clientName?: string;
  /** Departure look-ahead in seconds */
  timeRange?: number;
  /** Maximum number of departures per query */
  departures?: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

export type ConfigKey = keyof AppConfig;
