import { readFile } from 'fs/promises';
import { google } from 'googleapis';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import type { ServiceAccountSource } from '../config';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ValuesResponse {
  data: { values?: unknown[][] | null };
}

/**
 * The slice of the Sheets v4 `spreadsheets.values` resource the row store uses.
 */
export interface SheetsValuesApi {
  get(
    params: { spreadsheetId: string; range: string; valueRenderOption: string; dateTimeRenderOption: string },
    options?: CallOptions,
  ): Promise<ValuesResponse>;
  append(
    params: {
      spreadsheetId: string;
      range: string;
      valueInputOption: string;
      insertDataOption: string;
      requestBody: { values: string[][] };
    },
    options?: CallOptions,
  ): Promise<unknown>;
  update(
    params: { spreadsheetId: string; range: string; valueInputOption: string; requestBody: { values: string[][] } },
    options?: CallOptions,
  ): Promise<unknown>;
}

const serviceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof serviceAccountSchema>;

export async function loadServiceAccount(source: ServiceAccountSource): Promise<ServiceAccountKey> {
  let raw: string;
  if (source.kind === 'json') {
    raw = source.json;
  } else {
    try {
      raw = await readFile(source.path, 'utf8');
    } catch (err) {
      throw new ConfigError([`cannot read service account file ${source.path}: ${errorMessage(err)}`]);
    }
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError([`service account key is not valid JSON: ${errorMessage(err)}`]);
  }

  const parsed = serviceAccountSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(['service account key needs client_email and private_key']);
  }
  return parsed.data;
}

export function createSheetsValuesApi(key: ServiceAccountKey): SheetsValuesApi {
  const auth = new google.auth.GoogleAuth({
    credentials: { client_email: key.client_email, private_key: key.private_key },
    scopes: [SHEETS_SCOPE],
  });
  const { values } = google.sheets({ version: 'v4', auth }).spreadsheets;

  return {
    get: (params, options) => values.get(params, { signal: options?.signal }),
    append: (params, options) => values.append(params, { signal: options?.signal }),
    update: (params, options) => values.update(params, { signal: options?.signal }),
  };
}
