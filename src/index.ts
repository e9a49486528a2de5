import { loadConfig } from './config/env.js';
import { buildServer } from './server.js';

/**
 * HTTP entry point: load config → build server → listen.
 * Plugins close their own connections on shutdown (onClose hooks).
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer(config);

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
