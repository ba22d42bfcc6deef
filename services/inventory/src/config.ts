import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

const DEFAULT_SHEET_NAME = 'MST工具治具';
const DEFAULT_CORS_ORIGIN = 'http://localhost:3000';

const intFrom = (fallback: number) =>
  z.preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : fallback),
    z.number().int().nonnegative(),
  );

const envSchema = z
  .object({
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().trim().optional(),
    GOOGLE_SERVICE_ACCOUNT_FILE: z.string().trim().optional(),
    GOOGLE_SPREADSHEET_ID: z
      .string({ required_error: 'is required' })
      .trim()
      .min(1, 'is required'),
    SHEET_NAME: z.string().trim().min(1).default(DEFAULT_SHEET_NAME),
    CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGIN),
    PORT: intFrom(8080),
    HOST: z.string().min(1).default('0.0.0.0'),
    STORE_TIMEOUT_MS: intFrom(10_000).refine((v) => v > 0, 'must be positive'),
    STORE_READ_RETRIES: intFrom(2),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  })
  .refine((env) => Boolean(env.GOOGLE_SERVICE_ACCOUNT_JSON || env.GOOGLE_SERVICE_ACCOUNT_FILE), {
    message: 'GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_SERVICE_ACCOUNT_FILE is required',
  });

export type ServiceAccountSource =
  | { kind: 'json'; json: string }
  | { kind: 'file'; path: string };

export interface AppConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  corsOrigins: string[];
  sheets: {
    credentials: ServiceAccountSource;
    spreadsheetId: string;
    sheetName: string;
  };
  store: {
    timeoutMs: number;
    readRetries: number;
  };
}

/**
 * Reads and validates the process environment. Throws `ConfigError` with the
 * problems found; the caller is expected to exit.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message,
      ),
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    sheets: {
      // inline JSON wins over a key file path
      credentials: e.GOOGLE_SERVICE_ACCOUNT_JSON
        ? { kind: 'json', json: e.GOOGLE_SERVICE_ACCOUNT_JSON }
        : { kind: 'file', path: e.GOOGLE_SERVICE_ACCOUNT_FILE ?? '' },
      spreadsheetId: e.GOOGLE_SPREADSHEET_ID,
      sheetName: e.SHEET_NAME,
    },
    store: {
      timeoutMs: e.STORE_TIMEOUT_MS,
      readRetries: e.STORE_READ_RETRIES,
    },
  };
}
