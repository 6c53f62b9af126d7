import fastify, { type FastifyInstance } from 'fastify';

import { getConfig } from './config';
import { errorHandlerPlugin } from './errors';
import { requestLoggingPlugin } from './logger';

export interface BuildServerOptions {
  disableDefaultHealthRoute?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();
  const helmet = await import('@fastify/helmet');
  const cors = await import('@fastify/cors');

  const app = fastify({
    logger: {
      level: config.runtime.logLevel
    },
    disableRequestLogging: true,
    trustProxy: true
  });

  await app.register(requestLoggingPlugin);
  await app.register(errorHandlerPlugin);

  await app.register(helmet.default, { global: true });
  await app.register(cors.default, {
    origin: true
  });

  if (!options.disableDefaultHealthRoute) {
    app.get('/health', async () => ({
      status: 'ok',
      service: config.runtime.serviceName
    }));
  }

  app.get('/ready', async () => ({
    status: 'ready',
    service: config.runtime.serviceName
  }));

  return app;
}
