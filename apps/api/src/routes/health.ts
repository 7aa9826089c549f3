import type { FastifyPluginAsync } from 'fastify';
import type { TodoStore } from '@todo/database';

interface HealthRoutesConfig {
  store: TodoStore;
  now: () => Date;
}

/**
 * Health check routes
 *
 * - /health/live - Liveness probe (is the server running?)
 * - /health/ready - Readiness probe (can the todo store be read?)
 */
export function createHealthRoutes(config: HealthRoutesConfig): FastifyPluginAsync {
  const { store, now } = config;

  return async (fastify) => {
    // Liveness probe - just checks if server is responding
    fastify.get('/live', async () => {
      return {
        status: 'ok',
        timestamp: now().toISOString(),
      };
    });

    // Readiness probe - checks if the store is usable
    fastify.get('/ready', async (request, reply) => {
      const checks: Record<string, boolean> = {
        server: true,
      };

      try {
        await store.listAll();
        checks['store'] = true;
      } catch (error) {
        request.log.warn({ err: error }, 'Readiness check: todo store unavailable');
        checks['store'] = false;
      }

      const allHealthy = Object.values(checks).every(Boolean);

      return reply.status(allHealthy ? 200 : 503).send({
        status: allHealthy ? 'ok' : 'degraded',
        timestamp: now().toISOString(),
        checks,
      });
    });
  };
}
