import type { Logger } from './logger.js';
import type { CiEvent, DeliverFn, WebhookOutcome } from '../domain/index.js';
import { renderEvent } from './message-renderer.js';
import { routeChannel } from './channel-router.js';

export interface WebhookHandlerDeps {
  readonly defaultChannel: string;
  readonly deliver: DeliverFn;
  readonly log: Logger;
}

/**
 * Use case: turn one webhook event into at most one chat message.
 *
 * 1. Render message and topic.
 * 2. Short-circuit with `filtered` when the message is blank.
 * 3. Route to a channel and deliver.
 *
 * Delivery errors propagate to the caller; nothing is retried.
 */
export async function handleWebhook(
  event: CiEvent,
  deps: WebhookHandlerDeps,
): Promise<WebhookOutcome> {
  const { message, topic } = renderEvent(event);

  if (message.trim() === '') {
    deps.log.info({ kind: event.kind }, 'Skipping filtered event');
    return { status: 'filtered', kind: event.kind };
  }

  const channel = routeChannel(event, deps.defaultChannel);

  await deps.deliver({ channel, topic, content: message });

  deps.log.info({ kind: event.kind, channel, topic }, 'Notification delivered');
  return { status: 'delivered', kind: event.kind, channel, topic };
}
