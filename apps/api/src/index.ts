import { createTodoStore, storeConfigFromEnv } from '@todo/database';
import { buildApp } from './app.js';
import { seedIfEmpty } from './seed.js';

/**
 * Todo REST API
 *
 * Handles:
 * - Todo CRUD under /todos
 * - Statistics and analysis
 * - Health checks
 */
async function main() {
  // Configuration from environment
  const config = {
    port: parseInt(process.env['PORT'] ?? '8000', 10),
    host: process.env['HOST'] ?? '0.0.0.0',
    store: storeConfigFromEnv(),
  };

  const store = createTodoStore(config.store);

  const fastify = await buildApp({
    store,
    logger: {
      level: process.env['LOG_LEVEL'] ?? 'info',
      transport:
        process.env['NODE_ENV'] === 'development'
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
    },
  });
  fastify.log.info({ dataFile: config.store.dataFile }, 'Todo store initialized');

  await seedIfEmpty(store, fastify.log);

  // Graceful shutdown
  const shutdown = async () => {
    fastify.log.info('Shutting down...');
    await fastify.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      fastify.log.error(err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  // Start server
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('[API] Fatal error:', error);
  process.exit(1);
});
