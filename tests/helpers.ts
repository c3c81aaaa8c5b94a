import { vi } from 'vitest';
import { normalizeEvent } from '../src/application/normalize-event.js';
import { webhookPayloadSchema } from '../src/application/event-schema.js';
import type { WebhookPayload, WebhookPipeline } from '../src/application/event-schema.js';
import type { CiEvent } from '../src/domain/index.js';
import type { Logger } from '../src/application/logger.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

/** Validates and normalizes a wire payload, as the HTTP route does. */
export function makeEvent(payload: WebhookPayload): CiEvent {
  return normalizeEvent(webhookPayloadSchema.parse(payload));
}

/** Pipeline whose provider carries an explicit repository URL. */
export function githubPipeline(overrides: Partial<WebhookPipeline> = {}): WebhookPipeline {
  return {
    name: 'My Pipeline',
    repository: 'git@github.com:my-org/my-repo.git',
    provider: { repository_url: 'https://github.com/my-org/my-repo' },
    ...overrides,
  };
}

export const BUILD_URL = 'https://buildkite.com/org/pipeline/builds/42';
export const JOB_URL = 'https://buildkite.com/org/pipeline/builds/42#job123';
