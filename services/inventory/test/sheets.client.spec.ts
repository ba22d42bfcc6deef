import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { loadServiceAccount } from '../src/sheets/client';
import { ConfigError } from '../src/errors';

const KEY = { client_email: 'svc@test.invalid', private_key: 'test-secret', project_id: 'test-project' };

describe('loadServiceAccount', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'inventory-key-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses an inline JSON blob', async () => {
    await expect(loadServiceAccount({ kind: 'json', json: JSON.stringify(KEY) })).resolves.toEqual(KEY);
  });

  it('reads a key file', async () => {
    const path = join(dir, 'key.json');
    await writeFile(path, JSON.stringify(KEY), 'utf8');
    await expect(loadServiceAccount({ kind: 'file', path })).resolves.toEqual(KEY);
  });

  it('reports a missing key file as a config error', async () => {
    await expect(loadServiceAccount({ kind: 'file', path: join(dir, 'absent.json') })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects malformed JSON', async () => {
    await expect(loadServiceAccount({ kind: 'json', json: '{not json' })).rejects.toThrow(/not valid JSON/);
  });

  it('rejects a key without a private key', async () => {
    await expect(
      loadServiceAccount({ kind: 'json', json: JSON.stringify({ client_email: 'svc@test.invalid' }) }),
    ).rejects.toThrow('Invalid configuration: service account key needs client_email and private_key');
  });
});
