import { loadConfig } from '@tabletalk/core';
import { startServer } from './server.js';

async function main(): Promise<void> {
  const server = await startServer({ config: loadConfig() });

  const shutdown = (signal: string): void => {
    server.log.info({ signal }, 'shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
