import { ConfigError, createServerConfig } from './config';
import { createLogger } from './logger';
import { startServer } from './server';

const bootLogger = createLogger('server');

async function main(): Promise<void> {
  const config = createServerConfig(process.env);
  const server = startServer(config);
  await server.ready;

  const shutdown = (signal: string) => {
    bootLogger.info(`Received ${signal}, shutting down`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        bootLogger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    bootLogger.error(`Invalid configuration: ${err.message}`);
  } else {
    bootLogger.error('Failed to start', { error: err instanceof Error ? err.message : String(err) });
  }
  process.exit(1);
});
