import 'dotenv/config';
import { loadConfig } from './config.js';
import { buildApp } from './app.js';

/**
 * Bootstrap the login-logger server.
 *
 * Order:
 * 1) Configuration (environment, optional .env)
 * 2) Application (plugins, routes)
 * 3) Shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig(process.env);

  const fastify = await buildApp(config);

  const shutdown = (signal: NodeJS.Signals): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  fastify.log.info(
    {
      store_path: config.store_path,
      throttle_per_minute: config.throttle.max_per_minute,
      discord: config.notifications.discord.webhook_url !== null,
      telegram:
        config.notifications.telegram.bot_token !== null
        && config.notifications.telegram.chat_id !== null,
    },
    'Login logger ready',
  );
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
