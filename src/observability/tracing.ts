/**
 * OpenTelemetry instrumentation setup
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { metrics } from '@opentelemetry/api';
import type { Logger } from './logger.js';

const SERVICE_NAME = 'sharepoint-mcp-server';

let sdk: NodeSDK | null = null;

/**
 * Start the OpenTelemetry SDK with a Prometheus scrape endpoint.
 * Must run before fastify is imported for the HTTP instrumentation to attach.
 */
export function initializeTracing(prometheusPort: number, logger: Logger): void {
  if (sdk) return;

  sdk = new NodeSDK({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: SERVICE_NAME,
      [SemanticResourceAttributes.SERVICE_VERSION]: process.env.npm_package_version || '1.0.0',
      [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: process.env.NODE_ENV || 'development',
    }),
    metricReader: new PrometheusExporter({
      port: prometheusPort,
      endpoint: '/metrics',
    }),
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fs': { enabled: false }, // Too verbose
        '@opentelemetry/instrumentation-http': { enabled: true },
        '@opentelemetry/instrumentation-fastify': { enabled: true },
      }),
    ],
  });

  sdk.start();
  logger.info({ prometheusPort }, '[OpenTelemetry] Tracing initialized, metrics on /metrics');
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  const running = sdk;
  sdk = null;
  await running.shutdown();
}

/**
 * Custom metrics. No-ops until the SDK is started.
 */
const meter = metrics.getMeter(SERVICE_NAME);

export const toolInvocationsCounter = meter.createCounter('mcp_tool_invocations_total', {
  description: 'Tool invocations by tool name and outcome',
});

export const toolDurationHistogram = meter.createHistogram('mcp_tool_duration_seconds', {
  description: 'Duration of tool invocations',
});

export const tokenAcquisitionsCounter = meter.createCounter('credential_token_acquisitions_total', {
  description: 'Access token acquisitions by strategy and outcome',
});
