import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import fastify, { type FastifyInstance } from 'fastify';

import { getConfig } from './config';
import { errorHandlerPlugin } from './errors';
import { requestLoggingPlugin } from './logger';

export interface BuildServerOptions {
  disableDefaultHealthRoute?: boolean;
  disableDefaultReadyRoute?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();

  const app = fastify({
    logger: { level: config.runtime.logLevel },
    disableRequestLogging: true,
    trustProxy: true
  });

  await app.register(requestLoggingPlugin);
  await app.register(errorHandlerPlugin);
  await app.register(helmet, { global: true });
  await app.register(cors, {
    origin: true
  });

  if (!options.disableDefaultHealthRoute) {
    app.get('/health', async () => ({
      status: 'ok',
      service: config.runtime.serviceName
    }));
  }

  if (!options.disableDefaultReadyRoute) {
    app.get('/ready', async () => ({
      status: 'ready',
      service: config.runtime.serviceName
    }));
  }

  return app;
}
