#!/usr/bin/env node
/**
 * ci-chat-bridge CLI
 *
 * Commands:
 *   ci-chat-bridge server  - Start the webhook server
 *   ci-chat-bridge test    - Send synthetic webhook events to a running server
 */

import { Command, InvalidArgumentError } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import pino from 'pino';
import { loadServerConfig, sendTestEvents } from './infrastructure/index.js';
import { SCENARIOS } from './application/index.js';
import { startServer } from './server.js';

dotenvConfig();

const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return n;
}

const program = new Command();

program
  .name('ci-chat-bridge')
  .description('Forwards CI webhook events to Zulip streams');

program
  .command('server')
  .description('Start the webhook server')
  .option('-p, --port <port>', 'Port to listen on (env: PORT, default 3000)', parseInteger)
  .option('--host <host>', 'Interface to bind (env: HOST, default 127.0.0.1)')
  .option('--zulip-bot-email <email>', 'Zulip bot email (env: ZULIP_BOT_EMAIL)')
  .option('--zulip-bot-api-key <key>', 'Zulip bot API key (env: ZULIP_BOT_API_KEY)')
  .option('--zulip-server-url <url>', 'Zulip server URL (env: ZULIP_SERVER_URL)')
  .option('--zulip-stream <stream>', 'Default stream to post to (env: ZULIP_STREAM)')
  .action(async (options: {
    port?: number;
    host?: string;
    zulipBotEmail?: string;
    zulipBotApiKey?: string;
    zulipServerUrl?: string;
    zulipStream?: string;
  }) => {
    const config = loadServerConfig(options);
    await startServer(config);
  });

program
  .command('test')
  .description('Send test webhook events to a running server')
  .option('--server-url <url>', 'Server URL to send test webhooks to', 'http://localhost:3000')
  .option('--event-type <type>', `One of: ${SCENARIOS.join(', ')}`, 'all')
  .option('--delay <seconds>', 'Delay between events in seconds', parseInteger, 2)
  .option('--build-number <n>', 'Build number to use for test events', parseInteger, 123)
  .action(async (options: {
    serverUrl: string;
    eventType: string;
    delay: number;
    buildNumber: number;
  }) => {
    log.info({ serverUrl: options.serverUrl }, 'Sending test webhook events');
    await sendTestEvents(
      {
        serverUrl: options.serverUrl,
        eventType: options.eventType,
        delaySeconds: options.delay,
        buildNumber: options.buildNumber,
      },
      log,
    );
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.fatal({ err }, 'Command failed');
  process.exit(1);
});
