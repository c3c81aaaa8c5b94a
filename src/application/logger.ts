import type { BaseLogger } from 'pino';

/**
 * The log methods the use cases and clients call. Both a `pino()` instance
 * and Fastify's `request.log` / `fastify.log` satisfy it.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
