import { createApp } from './app.js';
import { config } from './config.js';

async function main(): Promise<void> {
  const app = await createApp();

  await app.listen({ port: config.port, host: '0.0.0.0' });
  app.log.info({ port: config.port, env: config.nodeEnv }, 'notefhir backend listening');

  function shutdown(signal: string) {
    app.log.info({ signal }, 'Shutting down gracefully');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  }

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
