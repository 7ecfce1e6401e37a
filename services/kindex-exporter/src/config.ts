import path from 'node:path';

import { z } from 'zod';

import { stationConfigSchema, stationListSchema, type StationConfig } from '@geomag/kindex';

export type EnvSource = Record<string, string | undefined>;

export interface FtpConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  secure: boolean;
  timeoutMs: number;
}

export interface ExporterConfig {
  host: string;
  port: number;
  logLevel: string;
  dataDir: string;
  /** Set when files are fetched from an FTP archive instead of `dataDir`. */
  ftp: FtpConfig | null;
  pollerEnabled: boolean;
  stations: StationConfig[];
}

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

const booleanVar = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return fallback;
      }
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (FALSE_VALUES.has(normalized)) {
        return false;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Accepted boolean values: ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
      });
      return z.NEVER;
    });

const envSchema = z.object({
  KINDEX_HOST: z.string().trim().default('0.0.0.0'),
  KINDEX_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  KINDEX_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  KINDEX_DATA_DIR: z.string().trim().default('data'),
  KINDEX_POLLER_ENABLED: booleanVar(true),
  KINDEX_FTP_HOST: z.string().trim().optional(),
  KINDEX_FTP_PORT: z.coerce.number().int().min(1).max(65535).default(21),
  KINDEX_FTP_USER: z.string().default('anonymous'),
  KINDEX_FTP_PASSWORD: z.string().default('anonymous@'),
  KINDEX_FTP_SECURE: booleanVar(false),
  KINDEX_FTP_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  KINDEX_FTP_PATH: z.string().optional(),
  KINDEX_STATIONS: z.string().optional(),
  KINDEX_STATION_CODE: z.string().default('ENT'),
  KINDEX_STATION_NAME: z.string().optional(),
  KINDEX_K9_LIMIT: z.string().default('500'),
  KINDEX_LEN_DAYS: z.string().default('3'),
  KINDEX_POLL_INTERVAL_MINUTES: z.string().default('10')
});

const SINGLE_STATION_VARS: Record<string, string> = {
  code: 'KINDEX_STATION_CODE',
  name: 'KINDEX_STATION_NAME',
  k9Limit: 'KINDEX_K9_LIMIT',
  lenDays: 'KINDEX_LEN_DAYS',
  pollIntervalMinutes: 'KINDEX_POLL_INTERVAL_MINUTES',
  remotePath: 'KINDEX_FTP_PATH'
};

const formatIssues = (issues: Array<{ path: (string | number)[]; message: string }>): string => {
  const details = issues
    .map(({ path: issuePath, message }) => `  - ${issuePath.length > 0 ? issuePath.join('.') : '<root>'}: ${message}`)
    .join('\n');
  return `[kindex-exporter] Invalid environment configuration\n${details}`;
};

// Unset and blank variables both fall back to their defaults.
const withoutBlankValues = (env: EnvSource): EnvSource =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim().length > 0));

const parseStationList = (raw: string): StationConfig[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new EnvConfigError(formatIssues([{ path: ['KINDEX_STATIONS'], message: 'must be valid JSON' }]));
  }

  const result = stationListSchema.safeParse(parsed);
  if (!result.success) {
    throw new EnvConfigError(
      formatIssues(
        result.error.issues.map((issue) => ({ path: ['KINDEX_STATIONS', ...issue.path], message: issue.message }))
      )
    );
  }
  return result.data;
};

const parseSingleStation = (env: z.output<typeof envSchema>): StationConfig[] => {
  const result = stationConfigSchema.safeParse({
    code: env.KINDEX_STATION_CODE,
    ...(env.KINDEX_STATION_NAME ? { name: env.KINDEX_STATION_NAME } : {}),
    k9Limit: env.KINDEX_K9_LIMIT,
    lenDays: env.KINDEX_LEN_DAYS,
    pollIntervalMinutes: env.KINDEX_POLL_INTERVAL_MINUTES,
    ...(env.KINDEX_FTP_PATH ? { remotePath: env.KINDEX_FTP_PATH } : {})
  });
  if (!result.success) {
    throw new EnvConfigError(
      formatIssues(
        result.error.issues.map((issue) => {
          const [field] = issue.path;
          const variable = typeof field === 'string' ? SINGLE_STATION_VARS[field] : undefined;
          return { path: variable ? [variable] : issue.path, message: issue.message };
        })
      )
    );
  }
  return [result.data];
};

export const loadConfig = (env: EnvSource = process.env): ExporterConfig => {
  const result = envSchema.safeParse(withoutBlankValues(env));
  if (!result.success) {
    throw new EnvConfigError(formatIssues(result.error.issues));
  }

  const parsed = result.data;
  const stations = parsed.KINDEX_STATIONS ? parseStationList(parsed.KINDEX_STATIONS) : parseSingleStation(parsed);
  const ftp: FtpConfig | null = parsed.KINDEX_FTP_HOST
    ? {
        host: parsed.KINDEX_FTP_HOST,
        port: parsed.KINDEX_FTP_PORT,
        user: parsed.KINDEX_FTP_USER,
        password: parsed.KINDEX_FTP_PASSWORD,
        secure: parsed.KINDEX_FTP_SECURE,
        timeoutMs: parsed.KINDEX_FTP_TIMEOUT_SECONDS * 1000
      }
    : null;

  return {
    host: parsed.KINDEX_HOST,
    port: parsed.KINDEX_PORT,
    logLevel: parsed.KINDEX_LOG_LEVEL,
    dataDir: path.resolve(process.cwd(), parsed.KINDEX_DATA_DIR),
    ftp,
    pollerEnabled: parsed.KINDEX_POLLER_ENABLED,
    stations
  };
};
