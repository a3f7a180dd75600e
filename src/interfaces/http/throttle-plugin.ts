import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { MinuteThrottle } from '../../application/index.js';

export interface ThrottleOptions {
  /** Requests allowed per client IP per clock minute; `0` disables the gate. */
  max_per_minute: number;
  now?: () => number;
}

/**
 * Request admission gate.
 *
 * Runs in `onRequest`, before body parsing, so a refused request never
 * reaches a route handler. Keyed by `request.ip`.
 */
async function throttlePlugin(fastify: FastifyInstance, opts: ThrottleOptions): Promise<void> {
  if (opts.max_per_minute <= 0) {
    fastify.log.info('Request throttle disabled');
    return;
  }

  const throttle = new MinuteThrottle(opts.max_per_minute);
  const now = opts.now ?? Date.now;

  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const decision = throttle.admit(request.ip, now());

    if (!decision.allowed) {
      request.log.warn({ ip: request.ip }, 'Rate limit exceeded');
      return reply
        .status(429)
        .header('retry-after', String(decision.retry_after_seconds))
        .send({ error: 'Rate limit exceeded' });
    }
  });
}

export default fp(throttlePlugin, {
  name: 'throttle',
  fastify: '5.x',
});
