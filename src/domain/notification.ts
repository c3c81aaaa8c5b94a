/**
 * A rendered chat notification.
 *
 * `message === ''` means the event is filtered and must not be delivered.
 * `topic` is always a non-empty label.
 */
export interface RenderedNotification {
  readonly message: string;
  readonly topic: string;
}

/** A message addressed to a channel and topic, ready for delivery. */
export interface ChatMessage {
  readonly channel: string;
  readonly topic: string;
  readonly content: string;
}

/** Delivers a chat message; rejects when the chat backend refuses it. */
export type DeliverFn = (message: ChatMessage) => Promise<void>;

/** Result of handling one webhook delivery. */
export type WebhookOutcome =
  | { readonly status: 'filtered'; readonly kind: string }
  | { readonly status: 'delivered'; readonly kind: string; readonly channel: string; readonly topic: string };
