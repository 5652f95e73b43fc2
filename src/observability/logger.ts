/**
 * pino logging for code that runs outside a Fastify request
 */

import pino from 'pino';

type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

/**
 * The subset of the pino API the core modules log through.
 * Both a plain pino logger and `fastify.log` satisfy it.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/**
 * Logger writing JSON lines to stderr, keeping stdout free for MCP stdio frames
 */
export function createStderrLogger(level: string, name = 'sharepoint-mcp'): pino.Logger {
  return pino({ name, level }, pino.destination(2));
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
