import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { StatsUpdateEventSchema } from '@strangerline/shared';
import { getStats, type Store } from '../../core/store';

type Dependencies = {
  store: Store;
};

export const registerSearchingRoutes = (
  fastify: FastifyInstance,
  deps: Dependencies
) => {
  fastify.get(
    '/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const response = StatsUpdateEventSchema.parse(getStats(deps.store));
      return reply.send(response);
    }
  );
};
