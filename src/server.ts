import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { zulipPlugin } from './infrastructure/index.js';
import type { ChatClient, ServerConfig } from './infrastructure/index.js';
import { webhookRoutes } from './interfaces/http/index.js';

export interface BuildServerOptions {
  /** Stand-in for the Zulip HTTP client. */
  chatClient?: ChatClient;
  /** Set to false to silence request logging. */
  logger?: boolean;
}

/**
 * Assembles the Fastify app without listening.
 *
 * Order:
 * 1) Chat client plugin
 * 2) HTTP routes
 */
export async function buildServer(
  config: ServerConfig,
  opts: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: opts.logger === false ? false : { level: config.logLevel },
  });

  await fastify.register(zulipPlugin, { config: config.zulip, client: opts.chatClient });
  await fastify.register(webhookRoutes);

  return fastify;
}

/**
 * Builds the app, listens, and closes it on SIGINT / SIGTERM.
 */
export async function startServer(config: ServerConfig): Promise<FastifyInstance> {
  const fastify = await buildServer(config);

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

  await fastify.listen({ host: config.host, port: config.port });
  return fastify;
}
