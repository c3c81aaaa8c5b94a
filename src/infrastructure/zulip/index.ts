export { createZulipClient } from './zulip-client.js';
export type { ChatClient } from './zulip-client.js';
export { default as zulipPlugin } from './zulip-plugin.js';
export type { ZulipPluginOptions } from './zulip-plugin.js';
