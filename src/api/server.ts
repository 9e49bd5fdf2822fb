import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { tokenRoutes } from './routes/tokens.js';
import { TokenService } from '../services/tokenService.js';
import { ConfigurationError, EntropySourceFailure } from '../registry/errors.js';
import { registry } from '../metrics/index.js';

export interface BuildServerOptions {
  service?: TokenService;
}

export async function buildServer(opts: BuildServerOptions = {}) {
  const app = Fastify({ logger: getLogger() });

  // One registry per process; tokens live as long as the server does
  const service = opts.service ?? new TokenService();

  app.get('/healthz', async () => {
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      registry: service.stats(),
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  // Registered before the routes plugin so its routes inherit it
  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof ConfigurationError) {
      return reply.status(400).send({ error: { code: error.code, message: error.message } });
    }
    if (error instanceof EntropySourceFailure) {
      return reply
        .status(503)
        .send({ error: { code: error.code, message: 'Token generation unavailable' } });
    }
    if (error.validation) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
    }
    // Malformed or empty JSON bodies and other client errors raised by fastify itself
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply
        .status(error.statusCode)
        .send({ error: { code: 'BAD_REQUEST', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  await app.register(tokenRoutes(service));

  return app;
}
