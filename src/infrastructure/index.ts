export { createZulipClient, zulipPlugin } from './zulip/index.js';
export type { ChatClient, ZulipPluginOptions } from './zulip/index.js';
export { loadServerConfig } from './config.js';
export type { ServerConfig, ZulipConfig, ConfigOverrides } from './config.js';
export { sendTestEvents } from './webhook/test-sender.js';
export type { SendTestEventsOptions, SendTestEventsResult } from './webhook/test-sender.js';
