import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { toUtcIso } from '../../application/index.js';

export interface HealthRoutesOptions {
  service_name: string;
  clock: () => Date;
}

/**
 * GET /: liveness probe. Touches nothing but the clock.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  fastify.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      ok: true,
      service: opts.service_name,
      time: toUtcIso(opts.clock()),
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
