/**
 * Config Service
 * Optional JSON config file plus environment overrides
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey } from '../types/config.js';
import {
  DEFAULT_CLIENT_NAME,
  DEFAULT_DEPARTURES,
  DEFAULT_TIME_RANGE,
  DEFAULT_TIMEOUT_MS,
} from './api.js';
import { isLogLevel, type LogLevel } from '../lib/logger.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'reise');
const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_CACHE_FILE = path.join(os.homedir(), '.cache', 'reise', 'stops.json');

type Env = Record<string, string | undefined>;

function positiveInt(value: unknown): number | undefined {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;
  private env: Env;

  constructor(configPath?: string, env: Env = process.env) {
    this.env = env;
    this.configPath = configPath || nonEmpty(env.REISE_CONFIG) || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * Read the config file; a missing or broken file means no settings
   */
  private load(): AppConfig {
    try {
      if (fs.existsSync(this.configPath)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
        if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
          return this.pick(parsed);
        }
      }
    } catch {
      // Fall through to defaults; the file is optional
    }
    return {};
  }

  private pick(raw: object): AppConfig {
    const get = (key: ConfigKey): unknown => Reflect.get(raw, key);
    const logLevel = nonEmpty(get('logLevel'));
    return {
      cacheFile: nonEmpty(get('cacheFile')),
      clientName: nonEmpty(get('clientName')),
      timeRange: positiveInt(get('timeRange')),
      departures: positiveInt(get('departures')),
      timeoutMs: positiveInt(get('timeoutMs')),
      logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
    };
  }

  /** Cache document path (REISE_CACHE_FILE wins) */
  getCacheFile(): string {
    return nonEmpty(this.env.REISE_CACHE_FILE) ?? this.config.cacheFile ?? DEFAULT_CACHE_FILE;
  }

  getClientName(): string {
    return nonEmpty(this.env.ET_CLIENT_NAME) ?? this.config.clientName ?? DEFAULT_CLIENT_NAME;
  }

  getTimeRange(): number {
    return positiveInt(this.env.REISE_TIME_RANGE) ?? this.config.timeRange ?? DEFAULT_TIME_RANGE;
  }

  getDepartureCount(): number {
    return positiveInt(this.env.REISE_DEPARTURES) ?? this.config.departures ?? DEFAULT_DEPARTURES;
  }

  getTimeoutMs(): number {
    return positiveInt(this.env.REISE_TIMEOUT_MS) ?? this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  getLogLevel(): LogLevel {
    const fromEnv = nonEmpty(this.env.REISE_LOG_LEVEL)?.toLowerCase();
    if (fromEnv !== undefined && isLogLevel(fromEnv)) {
      return fromEnv;
    }
    return this.config.logLevel ?? 'warn';
  }

  /** Colour output unless NO_COLOR is set or stdout is not a terminal */
  useColor(isTTY: boolean = process.stdout.isTTY === true): boolean {
    return isTTY && this.env.NO_COLOR === undefined;
  }
}

let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
