import { createTodoStore, storeConfigFromEnv } from '@todo/database';
import { buildWebApp } from './app.js';

/**
 * Todo Web UI
 *
 * Server-rendered pages over the same JSON store as the API.
 */
async function main() {
  const config = {
    port: parseInt(process.env['WEB_PORT'] ?? '8001', 10),
    host: process.env['HOST'] ?? '0.0.0.0',
    store: storeConfigFromEnv(),
  };

  const fastify = await buildWebApp({
    store: createTodoStore(config.store),
    logger: {
      level: process.env['LOG_LEVEL'] ?? 'info',
      transport:
        process.env['NODE_ENV'] === 'development'
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
    },
  });

  const onSignal = () => {
    fastify.log.info('Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error(err);
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('[Web] Fatal error:', error);
  process.exit(1);
});
