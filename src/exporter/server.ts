import fastify, { FastifyInstance } from 'fastify';
import { Registry } from 'prom-client';
import { normalizeError } from '../errors';
import { logLevel } from '../logger';
import { applyGlobalPrefix } from './prefix';

export interface ExporterServerOptions {
  registry: Registry;
  /** Already validated. */
  path: string;
  globalPrefix?: string;
  logLevel?: string;
}

export async function gather(registry: Registry, globalPrefix?: string): Promise<string> {
  const exposition = await registry.metrics();
  return globalPrefix ? applyGlobalPrefix(exposition, globalPrefix) : exposition;
}

export function buildExporterServer(options: ExporterServerOptions): FastifyInstance {
  const server = fastify({
    logger: { level: options.logLevel ?? logLevel() },
    disableRequestLogging: true
  });

  server.setErrorHandler((err, req, reply) => {
    const error = normalizeError(err);
    req.log.error({ err: error.message, code: error.code }, 'metrics gather failed');
    reply.code(500).type('text/plain').send('Internal Server Error');
  });

  server.setNotFoundHandler((_req, reply) => {
    reply.code(404).type('text/plain').send('Not Found');
  });

  server.get(options.path, async (_req, reply) => {
    const payload = await gather(options.registry, options.globalPrefix);
    return reply.type(options.registry.contentType).send(payload);
  });

  return server;
}
