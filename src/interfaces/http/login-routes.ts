import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ingestLogin, toHttpResponse } from '../../application/index.js';
import type { IngestDeps } from '../../application/index.js';

export interface LoginRoutesOptions {
  deps: IngestDeps;
}

/**
 * Registers the login ingestion route.
 *
 * POST /login: raw body → pipeline → 201 / 400 / 422 / 500
 *
 * The body arrives as text (see `buildApp`), so empty and malformed
 * bodies are classified by the pipeline rather than by Fastify.
 */
async function loginRoutes(fastify: FastifyInstance, opts: LoginRoutesOptions): Promise<void> {
  fastify.post(
    '/login',
    async (request: FastifyRequest<{ Body: string | undefined }>, reply: FastifyReply) => {
      const result = await ingestLogin(opts.deps, {
        rawBody: request.body,
        ip: request.ip,
      });

      if (result.state === 'rejected_invalid') {
        request.log.debug({ errors: result.errors }, 'Login event rejected');
      }

      const { status, body } = toHttpResponse(result);
      return reply.status(status).send(body);
    },
  );
}

export default fp(loginRoutes, {
  name: 'login-routes',
  fastify: '5.x',
});
