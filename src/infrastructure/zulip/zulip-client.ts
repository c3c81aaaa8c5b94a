import type { Logger } from '../../application/logger.js';
import { ChatDeliveryError } from '../../domain/index.js';
import type { ChatMessage } from '../../domain/index.js';
import type { ZulipConfig } from '../config.js';

/** Outbound side of the bridge: anything that can post a stream message. */
export interface ChatClient {
  sendMessage(message: ChatMessage): Promise<void>;
}

/**
 * Client for the Zulip messages API.
 *
 * POSTs `type=stream`, `to`, `topic` and `content` form fields to
 * `<serverUrl>/api/v1/messages`, authenticated as the bot with HTTP basic
 * auth. Any non-2xx answer or network failure rejects with
 * `ChatDeliveryError`; there is no retry.
 */
export function createZulipClient(config: ZulipConfig, log: Logger): ChatClient {
  const endpoint = `${config.serverUrl}/api/v1/messages`;
  const credentials = Buffer.from(`${config.botEmail}:${config.apiKey}`).toString('base64');

  return {
    async sendMessage(message: ChatMessage): Promise<void> {
      const body = new URLSearchParams({
        type: 'stream',
        to: message.channel,
        topic: message.topic,
        content: message.content,
      });

      let response: Response;
      try {
        response = await fetch(endpoint, {
          method: 'POST',
          headers: {
            'Authorization': `Basic ${credentials}`,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body,
        });
      } catch (err: unknown) {
        throw new ChatDeliveryError('Failed to reach chat server', { cause: err });
      }

      if (!response.ok) {
        const responseBody = await response.text();
        throw new ChatDeliveryError(
          `Chat server returned ${response.status}`,
          { status: response.status, responseBody },
        );
      }

      log.debug({ channel: message.channel, topic: message.topic }, 'Chat message sent');
    },
  };
}
