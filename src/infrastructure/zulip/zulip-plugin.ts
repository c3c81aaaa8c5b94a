import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ZulipConfig } from '../config.js';
import { createZulipClient } from './zulip-client.js';
import type { ChatClient } from './zulip-client.js';

export interface ZulipPluginOptions {
  config: ZulipConfig;
  /** Replaces the HTTP client, e.g. with an in-process fake. */
  client?: ChatClient;
}

/**
 * Fastify plugin that provides the chat client.
 *
 * Decorates `fastify.chat` and `fastify.defaultChannel` for the routes.
 */
async function zulipPlugin(fastify: FastifyInstance, opts: ZulipPluginOptions): Promise<void> {
  const client = opts.client ?? createZulipClient(opts.config, fastify.log);

  fastify.decorate('chat', client);
  fastify.decorate('defaultChannel', opts.config.stream);

  fastify.log.info(
    { serverUrl: opts.config.serverUrl, botEmail: opts.config.botEmail, stream: opts.config.stream },
    'Chat client ready',
  );
}

export default fp(zulipPlugin, {
  name: 'chat',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.chat` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    chat: ChatClient;
    defaultChannel: string;
  }
}
