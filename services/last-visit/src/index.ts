import { buildApp } from './server';
import { config } from './config';
import { closeRedis } from './redis/client';

/**
 * Main entrypoint for the last-visit service.
 * Builds the app against Redis and listens on the configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    await closeRedis();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Last-visit server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting last-visit service:', err);
  process.exit(1);
});
