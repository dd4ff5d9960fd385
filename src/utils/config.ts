/**
 * Configuration loading and validation for whenfree
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type { DayOfWeek, GoogleProviderConfig, HoursFilter, ProviderConfig } from '../types/index.js';
import { DayOfWeekSchema, HoursFilterSchema, TimezoneSchema } from '../schemas/common.js';
import { configurationError } from './error.js';
import type { LogLevel } from './logger.js';

// Load environment variables
loadEnv();

/**
 * Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  logLevel: LogLevel;
}

/**
 * Availability defaults
 */
export interface DefaultsConfig {
  timezone: string;
  weekStart: DayOfWeek;
  workHours: HoursFilter;
  personalHours: HoursFilter;
  /** Free slots shorter than this are not reported */
  minimumSlotDurationMinutes: number;
}

/**
 * Full application configuration
 */
export interface AppConfig {
  server: ServerConfig;
  defaults: DefaultsConfig;
  providers: ProviderConfig[];
}

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const DefaultsConfigSchema = z.object({
  timezone: TimezoneSchema,
  weekStart: DayOfWeekSchema,
  workHours: HoursFilterSchema,
  personalHours: HoursFilterSchema,
  minimumSlotDurationMinutes: z.number().int().nonnegative(),
});

/**
 * Get environment variable with optional default
 */
function getEnv(key: string): string | undefined;
function getEnv(key: string, defaultValue: string): string;
function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Get boolean environment variable
 */
function getBoolEnv(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get number environment variable
 */
function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get comma-separated list environment variable
 */
function getListEnv(key: string, defaultValue: string[]): string[] {
  const value = getEnv(key);
  if (!value) return defaultValue;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Load an hours filter (with optional break) from a variable prefix
 */
function loadHours(prefix: 'WORK' | 'PERSONAL', start: string, end: string): HoursFilter {
  const hours: HoursFilter = {
    start: getEnv(`${prefix}_HOURS_START`, start),
    end: getEnv(`${prefix}_HOURS_END`, end),
  };

  const breakStart = getEnv(`${prefix}_BREAK_START`);
  const breakEnd = getEnv(`${prefix}_BREAK_END`);
  if (breakStart && breakEnd) {
    hours.midDayBreak = { start: breakStart, end: breakEnd };
  }

  return hours;
}

/**
 * Load Google Calendar configuration from environment
 */
function loadGoogleConfig(): GoogleProviderConfig | null {
  if (!getBoolEnv('GOOGLE_ENABLED', false)) {
    return null;
  }

  const accessToken = getEnv('GOOGLE_ACCESS_TOKEN');
  const refreshToken = getEnv('GOOGLE_REFRESH_TOKEN');

  if (!accessToken && !refreshToken) {
    throw configurationError(
      'GOOGLE_ENABLED is true but neither GOOGLE_ACCESS_TOKEN nor GOOGLE_REFRESH_TOKEN is set'
    );
  }

  return {
    type: 'google',
    id: getEnv('GOOGLE_PROVIDER_ID', 'google-primary'),
    name: getEnv('GOOGLE_PROVIDER_NAME', 'Google Calendar'),
    enabled: true,
    calendarIds: getListEnv('GOOGLE_CALENDAR_IDS', ['primary']),
    clientId: getEnv('GOOGLE_CLIENT_ID'),
    clientSecret: getEnv('GOOGLE_CLIENT_SECRET'),
    redirectUri: getEnv('GOOGLE_REDIRECT_URI'),
    credentials: {
      accessToken: accessToken ?? '',
      refreshToken: refreshToken ?? '',
      tokenExpiry: getEnv('GOOGLE_TOKEN_EXPIRY'),
    },
  };
}

/**
 * Load all calendar source configurations
 */
function loadProviders(): ProviderConfig[] {
  const providers: ProviderConfig[] = [];

  const google = loadGoogleConfig();
  if (google) providers.push(google);

  return providers;
}

/**
 * Load full application configuration
 */
export function loadConfig(): AppConfig {
  const logLevel = LogLevelSchema.safeParse(getEnv('LOG_LEVEL', 'info'));
  if (!logLevel.success) {
    throw configurationError(`Invalid LOG_LEVEL: ${getEnv('LOG_LEVEL', '')}`);
  }

  const defaults = DefaultsConfigSchema.safeParse({
    timezone: getEnv('DEFAULT_TIMEZONE', 'UTC'),
    weekStart: getEnv('WEEK_START', 'monday').toLowerCase(),
    workHours: loadHours('WORK', '09:00', '17:00'),
    personalHours: loadHours('PERSONAL', '08:00', '22:00'),
    minimumSlotDurationMinutes: getNumberEnv('MINIMUM_SLOT_DURATION', 30),
  });

  if (!defaults.success) {
    const issues = defaults.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw configurationError(`Invalid configuration: ${issues}`, {
      issues: defaults.error.issues.map(i => i.path.join('.')),
    });
  }

  return {
    server: {
      name: getEnv('MCP_SERVER_NAME', 'whenfree'),
      version: getEnv('MCP_SERVER_VERSION', '1.0.0'),
      logLevel: logLevel.data,
    },
    defaults: defaults.data,
    providers: loadProviders(),
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get configuration (loads once)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Resolve the hours filter a policy stands for; null means all hours
 */
export function hoursForPolicy(
  policy: 'work' | 'personal' | 'all',
  defaults: DefaultsConfig
): HoursFilter | null {
  switch (policy) {
    case 'work':
      return defaults.workHours;
    case 'personal':
      return defaults.personalHours;
    case 'all':
      return null;
  }
}
