import type { FastifyPluginAsync } from 'fastify';
import { toAnalysisPayload } from '@todo/ai';
import type { TodoStore } from '@todo/database';
import { analyzeTodos, computeStats } from '@todo/insights';

interface InsightRoutesConfig {
  store: TodoStore;
  now: () => Date;
}

/**
 * Statistics and analysis routes
 *
 * - GET /stats    - counts, completion rate, overdue count
 * - GET /analysis - narrative summary with a recommendation
 */
export function createInsightRoutes(config: InsightRoutesConfig): FastifyPluginAsync {
  const { store, now } = config;

  return async (fastify) => {
    fastify.get('/stats', async () => computeStats(await store.listAll(), now()));

    fastify.get('/analysis', async () =>
      toAnalysisPayload(analyzeTodos(await store.listAll(), now()))
    );
  };
}
