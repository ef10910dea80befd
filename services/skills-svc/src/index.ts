import { buildServer, getLogger } from '@skillgap/common';

import { getSkillsServiceConfig } from './config';
import { createSkillsEngine } from './engine';
import { registerRoutes } from './routes';

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'skills-svc';
  const logger = getLogger({ module: 'bootstrap' });

  try {
    const config = getSkillsServiceConfig();
    logger.info(
      { serviceName: config.base.runtime.serviceName, embeddingProvider: config.embedding.provider },
      'Configuration loaded'
    );

    const engine = createSkillsEngine(config);

    const server = await buildServer({ disableDefaultReadyRoute: true });
    await registerRoutes(server, { engine, config });

    await server.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port }, 'skills-svc listening (building knowledge index...)');

    setImmediate(() => {
      engine.retriever.initialize().catch((error: unknown) => {
        logger.error({ error }, 'Knowledge index initialization failed; search will retry on demand.');
      });
    });

    const shutdown = async () => {
      logger.info('Received shutdown signal.');
      try {
        await server.close();
        logger.info('Server closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Failed to close server gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to bootstrap skills-svc');
    process.exit(1);
  }
}

void bootstrap();
