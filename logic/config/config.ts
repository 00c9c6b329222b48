import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_API_BASE_URL, DEFAULT_TARIFF_NAME, PUBLIC_TARIFF_NAMES } from '../tariffApi/apiClient';
import { DEFAULT_TOKEN_URL } from '../auth/oauthClient';
import { ConfigError, extractErrorMessage } from '../utils/errorUtils';
import { isValidTimeZone } from '../utils/dateUtils';

export const DEFAULT_CONFIG_PATH = 'tariffs.config.json';
export const DEFAULT_DATA_DIR = '.tariff-data';
export const DEFAULT_TIMEZONE = 'Europe/Zurich';
export const DEFAULT_REFRESH_TIME = '18:30';

const timeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected a time of day as HH:mm');

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().nonnegative().default(2000),
  maxDelayMs: z.number().int().nonnegative().default(60000),
});

const baseEntrySchema = z.object({
  id: z.string().min(1).regex(/^[A-Za-z0-9_-]+$/, 'Use letters, digits, "-" and "_" only'),
  timezone: z.string().refine(isValidTimeZone, 'Unknown IANA time zone').default(DEFAULT_TIMEZONE),
  refreshTime: timeOfDaySchema.default(DEFAULT_REFRESH_TIME),
  includeVat: z.boolean().default(false),
  windowDurations: z.array(z.union([z.literal(120), z.literal(240)])).default([120, 240]),
  quantileFractions: z.array(z.number().gt(0).lt(1)).default([0.25]),
  retry: retrySchema.default({}),
});

const publicEntrySchema = baseEntrySchema.extend({
  authType: z.literal('public'),
  tariffName: z.enum(PUBLIC_TARIFF_NAMES).default(DEFAULT_TARIFF_NAME),
});

const oauthEntrySchema = baseEntrySchema.extend({
  authType: z.literal('oauth'),
  emsInstanceId: z.string().min(1),
  redirectUri: z.string().url(),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  tokenFile: z.string().min(1).optional(),
  emsCheckIntervalMinutes: z.number().int().positive().default(360),
});

const entrySchema = z.discriminatedUnion('authType', [publicEntrySchema, oauthEntrySchema]);

export const configSchema = z.object({
  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  tokenUrl: z.string().url().default(DEFAULT_TOKEN_URL),
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  entries: z.array(entrySchema).min(1),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['entries', index, 'id'],
        message: `Duplicate entry id "${entry.id}"`,
      });
    }
    seen.add(entry.id);
  });
});

export type AppConfig = z.infer<typeof configSchema>;
export type EntryConfig = z.infer<typeof entrySchema>;
export type PublicEntryConfig = z.infer<typeof publicEntrySchema>;
export type OAuthEntryConfig = z.infer<typeof oauthEntrySchema>;

/**
 * Render zod issues as "path: message" lines
 */
function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a parsed configuration object and apply defaults
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(raw: unknown): AppConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read and validate the configuration file
 * @param configPath - Path to the JSON file
 * @throws ConfigError if the file is missing, not JSON or invalid
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let text: string;
  try {
    text = await fs.promises.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration ${configPath}: ${extractErrorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration ${configPath} is not valid JSON: ${extractErrorMessage(error)}`, { cause: error });
  }

  return parseConfig(raw);
}

/**
 * Where an OAuth entry keeps its token set
 */
export function resolveTokenFile(config: AppConfig, entry: OAuthEntryConfig): string {
  return entry.tokenFile ?? path.join(config.dataDir, `${entry.id}.tokens.json`);
}

/**
 * Where an entry keeps its last published schedules
 */
export function resolveScheduleFile(config: AppConfig, entry: EntryConfig): string {
  return path.join(config.dataDir, `${entry.id}.schedules.json`);
}
