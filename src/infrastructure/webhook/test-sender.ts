import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../application/logger.js';
import { buildTestScenario } from '../../application/test-events.js';

export interface SendTestEventsOptions {
  /** Base URL of a running bridge, e.g. `http://localhost:3000`. */
  serverUrl: string;
  eventType: string;
  /** Pause between consecutive events. */
  delaySeconds: number;
  buildNumber: number;
}

export interface SendTestEventsResult {
  sent: number;
  failed: number;
}

/**
 * POSTs a synthetic scenario to `<serverUrl>/webhook`, one event at a time.
 *
 * A non-2xx answer is logged and counted; a network failure rejects.
 * Unknown scenario names reject with `UnknownScenarioError` before
 * anything is sent.
 */
export async function sendTestEvents(
  opts: SendTestEventsOptions,
  log: Logger,
): Promise<SendTestEventsResult> {
  const events = buildTestScenario(opts.eventType, opts.buildNumber);
  const webhookUrl = `${opts.serverUrl.replace(/\/+$/, '')}/webhook`;
  const result: SendTestEventsResult = { sent: 0, failed: 0 };

  for (const [i, event] of events.entries()) {
    log.info(
      { index: i + 1, total: events.length, event: event.event },
      'Sending test event',
    );

    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(event),
    });

    if (response.ok) {
      result.sent++;
      log.info({ event: event.event, status: response.status }, 'Test event accepted');
    } else {
      result.failed++;
      const body = await response.text();
      log.error({ event: event.event, status: response.status, body }, 'Test event rejected');
    }

    if (i < events.length - 1 && opts.delaySeconds > 0) {
      await sleep(opts.delaySeconds * 1000);
    }
  }

  log.info(result, 'All test events sent');
  return result;
}
