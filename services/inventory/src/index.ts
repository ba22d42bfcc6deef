import { loadConfig } from './config';
import { buildApp } from './server';
import { createSheetsValuesApi, loadServiceAccount } from './sheets/client';
import { GoogleSheetsRowStore } from './storage/googleSheetsRowStore';
import { pngQrEncoder } from './qr/encoder';

/**
 * Main entrypoint for the inventory API.
 * Validates config, connects to the sheet, checks its header, then listens.
 */
async function main() {
  const config = loadConfig();
  const key = await loadServiceAccount(config.sheets.credentials);

  const store = new GoogleSheetsRowStore(createSheetsValuesApi(key), {
    spreadsheetId: config.sheets.spreadsheetId,
    sheetName: config.sheets.sheetName,
    timeoutMs: config.store.timeoutMs,
    readRetries: config.store.readRetries,
  });

  const { app, inventory } = await buildApp({
    store,
    qr: pngQrEncoder,
    corsOrigins: config.corsOrigins,
    logger: { level: config.logLevel },
  });

  // --- Refuse to serve against a sheet with the wrong header ---
  const schema = await inventory.verifySchema();
  if (!schema.ok) {
    app.log.fatal({ err: schema.error }, 'Sheet schema check failed');
    await app.close();
    process.exit(1);
  }
  app.log.info({ sheet: config.sheets.sheetName, columns: schema.value }, 'Sheet header verified');

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // config and credential errors land here, before the logger exists
  console.error('Fatal error starting inventory API:', err instanceof Error ? err.message : err);
  process.exit(1);
});
