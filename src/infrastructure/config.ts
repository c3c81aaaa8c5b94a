import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

/**
 * Server configuration.
 *
 * Sources, highest precedence first: explicit overrides (CLI flags),
 * then environment variables, then defaults.
 *
 * | Field            | Env var             | Default     |
 * |------------------|---------------------|-------------|
 * | host             | HOST                | 127.0.0.1   |
 * | port             | PORT                | 3000        |
 * | logLevel         | LOG_LEVEL           | info        |
 * | zulip.botEmail   | ZULIP_BOT_EMAIL     | (required)  |
 * | zulip.apiKey     | ZULIP_BOT_API_KEY   | (required)  |
 * | zulip.serverUrl  | ZULIP_SERVER_URL    | (required)  |
 * | zulip.stream     | ZULIP_STREAM        | (required)  |
 */
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const zulipConfigSchema = z.object({
  botEmail: z.string().min(1),
  apiKey: z.string().min(1),
  serverUrl: z.string().url().transform((url) => url.replace(/\/+$/, '')),
  stream: z.string().min(1),
});

const serverConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  zulip: zulipConfigSchema,
});

export type ZulipConfig = z.infer<typeof zulipConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;

export interface ConfigOverrides {
  host?: string;
  port?: number | string;
  logLevel?: string;
  zulipBotEmail?: string;
  zulipBotApiKey?: string;
  zulipServerUrl?: string;
  zulipStream?: string;
}

const ENV_NAMES: Record<string, string> = {
  'host': 'HOST',
  'port': 'PORT',
  'logLevel': 'LOG_LEVEL',
  'zulip.botEmail': 'ZULIP_BOT_EMAIL',
  'zulip.apiKey': 'ZULIP_BOT_API_KEY',
  'zulip.serverUrl': 'ZULIP_SERVER_URL',
  'zulip.stream': 'ZULIP_STREAM',
};

/**
 * Builds and validates the server configuration.
 * Throws `ConfigError` naming each offending variable.
 */
export function loadServerConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const parsed = serverConfigSchema.safeParse({
    host: overrides.host ?? env['HOST'],
    port: overrides.port ?? env['PORT'],
    logLevel: overrides.logLevel ?? env['LOG_LEVEL'],
    zulip: {
      botEmail: overrides.zulipBotEmail ?? env['ZULIP_BOT_EMAIL'],
      apiKey: overrides.zulipBotApiKey ?? env['ZULIP_BOT_API_KEY'],
      serverUrl: overrides.zulipServerUrl ?? env['ZULIP_SERVER_URL'],
      stream: overrides.zulipStream ?? env['ZULIP_STREAM'],
    },
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return `${ENV_NAMES[path] ?? path}: ${issue.message}`;
      }),
    );
  }

  return parsed.data;
}
