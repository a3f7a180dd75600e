import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import type { AppConfig } from './config.js';
import type { IngestDeps, LoginNotifier, LoginStore } from './application/index.js';
import { DEFAULT_SENSITIVE_KEYS } from './domain/index.js';
import { createJsonlStore, createLoginNotifier } from './infrastructure/index.js';
import { loginRoutes, healthRoutes, throttlePlugin } from './interfaces/http/index.js';

/** Collaborators tests swap out; production uses the defaults. */
export interface AppOverrides {
  store?: LoginStore;
  notify?: LoginNotifier;
  clock?: () => Date;
  /** Millisecond clock for the throttle. */
  now?: () => number;
  /** `false` silences Fastify's pino logger. */
  logger?: false;
}

/**
 * Builds the Fastify application without listening.
 *
 * Order:
 * 1) Body parsing (raw text for every content type)
 * 2) Error and not-found handlers
 * 3) Throttle gate
 * 4) Routes
 */
export async function buildApp(
  config: AppConfig,
  overrides: AppOverrides = {},
): Promise<FastifyInstance> {

  const fastify = Fastify({
    logger: overrides.logger ?? { level: config.log_level },
    trustProxy: config.trust_proxy,
  });

  // --------------------------------------------------
  // Body parsing
  // --------------------------------------------------

  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  // --------------------------------------------------
  // Error handling
  // --------------------------------------------------

  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const status = err.statusCode ?? 500;

    if (status >= 400 && status < 500) {
      return reply.status(status).send({ error: err.message });
    }

    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal server error' });
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ error: 'Not found' });
  });

  // --------------------------------------------------
  // Throttle
  // --------------------------------------------------

  await fastify.register(throttlePlugin, {
    max_per_minute: config.throttle.max_per_minute,
    now: overrides.now,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const clock = overrides.clock ?? (() => new Date());

  const deps: IngestDeps = {
    store: overrides.store ?? createJsonlStore(config.store_path, fastify.log),
    notify: overrides.notify ?? createLoginNotifier(config.notifications, fastify.log),
    clock,
    log: fastify.log,
    sensitive_keys: DEFAULT_SENSITIVE_KEYS,
  };

  await fastify.register(healthRoutes, { service_name: config.service_name, clock });
  await fastify.register(loginRoutes, { deps });

  return fastify;
}
