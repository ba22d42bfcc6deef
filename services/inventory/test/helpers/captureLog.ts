import Fastify, { type FastifyBaseLogger } from 'fastify';

export interface LogLine {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

export const LEVEL = { info: 30, warn: 40, error: 50 } as const;

/**
 * A real Fastify (pino) logger whose output lands in memory.
 */
export function captureLog(): { log: FastifyBaseLogger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const app = Fastify({
    logger: {
      level: 'info',
      stream: {
        write(msg: string) {
          const line: LogLine = JSON.parse(msg);
          lines.push(line);
        },
      },
    },
  });
  return { log: app.log, lines };
}
