import { loadServerConfig } from './infrastructure/index.js';
import { startServer } from './server.js';

/**
 * Bootstrap the webhook server from environment variables.
 *
 * Same as `ci-chat-bridge server` with no flags.
 */
async function main(): Promise<void> {
  const config = loadServerConfig();
  await startServer(config);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
