import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { registerToolRoutes } from './routes/tools';
import { ToolInventory } from './service/toolInventory';
import type { RowStore } from './contracts/rowStore';
import type { QrEncoder } from './qr/encoder';
import type { IdSource } from './ids';

export interface AppDeps {
  store: RowStore;
  qr: QrEncoder;
  corsOrigins?: string[];
  logger?: FastifyServerOptions['logger'];
  ids?: IdSource;
}

export async function buildApp(deps: AppDeps) {
  const app = Fastify({ logger: deps.logger ?? false });
  const inventory = new ToolInventory({ store: deps.store, qr: deps.qr, log: app.log, ids: deps.ids });

  await app.register(cors, {
    origin: deps.corsOrigins ?? ['http://localhost:3000'],
    credentials: true,
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      req.log.error({ err }, 'Unhandled request error');
      return reply.code(500).send({ error: 'internal_error', detail: err.message });
    }
    return reply.code(statusCode).send({ error: 'bad_request', detail: err.message });
  });

  app.get('/', async () => ({ message: 'Tool & jig inventory API' }));

  app.get('/health', async () => {
    try {
      await deps.store.getHeader();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Row store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerToolRoutes(app, inventory);
  return { app, inventory };
}
