import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { BanStatusResponseSchema } from '@strangerline/shared';
import type { BanService } from './bans';

type Dependencies = {
  bans: BanService;
};

export const registerModerationRoutes = (
  fastify: FastifyInstance,
  deps: Dependencies
) => {
  fastify.get(
    '/check_ban',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const status = await deps.bans.checkBan(request.ip);
      if (!status.banned) {
        return reply.send(BanStatusResponseSchema.parse({ banned: false }));
      }

      request.log.info({ event: 'ban_checked', address: request.ip }, 'Active ban reported');
      const response = BanStatusResponseSchema.parse({
        banned: true,
        ban_end: new Date(status.banEnd).toISOString(),
        reason: status.reason,
      });
      return reply.send(response);
    }
  );
};
