export { webhookPayloadSchema } from './event-schema.js';
export type { WebhookPayload, WebhookPipeline } from './event-schema.js';
export { normalizeEvent } from './normalize-event.js';
export { resolveRepoUrl } from './repo-url.js';
export { renderEvent, renderMessage, formatTopic, jobDisplayName, FILTERED } from './message-renderer.js';
export { routeChannel } from './channel-router.js';
export { handleWebhook } from './webhook-handler.js';
export type { WebhookHandlerDeps } from './webhook-handler.js';
export type { Logger } from './logger.js';
export { buildTestScenario, SCENARIOS } from './test-events.js';
export type { Scenario } from './test-events.js';
