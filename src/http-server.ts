#!/usr/bin/env node

/**
 * Long-running HTTP entry point for hosted deployments (App Service, containers)
 */

import { loadStartupConfig } from './app.js';
import { createStderrLogger } from './observability/logger.js';
import { initializeTracing, shutdownTracing } from './observability/tracing.js';

const config = loadStartupConfig();

// Initialize OpenTelemetry before fastify is loaded so its instrumentation can attach
if (config.telemetry.enabled) {
  initializeTracing(config.telemetry.prometheusPort, createStderrLogger(config.logLevel, 'telemetry'));
}

const { buildServer } = await import('./fastify-server.js');

const { fastify } = await buildServer({
  config,
  logger: {
    level: config.logLevel,
    transport:
      process.env.NODE_ENV === 'production'
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
  },
});

const { host, port } = config.http;

try {
  await fastify.listen({ port, host });
  fastify.log.info(`SharePoint MCP server listening on http://${host}:${port}`);
  fastify.log.info('Endpoints: POST /mcp, POST /execute, GET /files, GET /site-info, GET /tools, GET /health');
} catch (err) {
  fastify.log.error(err);
  process.exit(1);
}

// Graceful shutdown
const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.once(signal, () => {
    fastify.log.info(`Received ${signal}, closing server`);
    fastify
      .close()
      .then(() => shutdownTracing())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
  });
});
