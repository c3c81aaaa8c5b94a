import { describe, it, expect } from 'vitest';
import { loadServerConfig } from '../../src/infrastructure/config.js';
import { ConfigError } from '../../src/domain/index.js';

const BASE_ENV = {
  ZULIP_BOT_EMAIL: 'ci-bot@zulip.example.com',
  ZULIP_BOT_API_KEY: 'test-secret',
  ZULIP_SERVER_URL: 'https://zulip.example.com/',
  ZULIP_STREAM: 'builds',
};

describe('loadServerConfig', () => {
  it('reads the environment and applies defaults', () => {
    expect(loadServerConfig({}, BASE_ENV)).toEqual({
      host: '127.0.0.1',
      port: 3000,
      logLevel: 'info',
      zulip: {
        botEmail: 'ci-bot@zulip.example.com',
        apiKey: 'test-secret',
        serverUrl: 'https://zulip.example.com',
        stream: 'builds',
      },
    });
  });

  it('parses PORT, HOST and LOG_LEVEL', () => {
    const config = loadServerConfig({}, { ...BASE_ENV, PORT: '8080', HOST: '0.0.0.0', LOG_LEVEL: 'debug' });
    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.logLevel).toBe('debug');
  });

  it('lets overrides win over the environment', () => {
    const config = loadServerConfig(
      { port: 4000, zulipStream: 'ci', zulipServerUrl: 'https://chat.example.com' },
      { ...BASE_ENV, PORT: '8080' },
    );
    expect(config.port).toBe(4000);
    expect(config.zulip.stream).toBe('ci');
    expect(config.zulip.serverUrl).toBe('https://chat.example.com');
  });

  it('names every missing variable', () => {
    try {
      loadServerConfig({}, {});
      expect.unreachable('should have thrown');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map((issue) => issue.split(':')[0])).toEqual([
          'ZULIP_BOT_EMAIL',
          'ZULIP_BOT_API_KEY',
          'ZULIP_SERVER_URL',
          'ZULIP_STREAM',
        ]);
      }
    }
  });

  it('rejects a malformed server URL', () => {
    expect(() => loadServerConfig({}, { ...BASE_ENV, ZULIP_SERVER_URL: 'not a url' }))
      .toThrow(ConfigError);
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadServerConfig({}, { ...BASE_ENV, PORT: '70000' })).toThrow(/PORT/);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadServerConfig({}, { ...BASE_ENV, LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
