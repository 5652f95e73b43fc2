/**
 * Fastify HTTP API for the SharePoint MCP server
 * Serves the MCP Streamable HTTP transport plus REST convenience endpoints
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z } from 'zod';
import { createServices, type ServiceOverrides, type Services } from './app.js';
import type { SharePointConfig } from './config.js';
import type { ErrorKind } from './errors.js';
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from './mcp/server.js';
import { TOOL_NAMES } from './tools/definitions.js';
import type { ToolFailure, ToolRequest, ToolResult } from './tools/dispatcher.js';

// Validation schemas
const ExecuteRequestSchema = z.object({
  tool_name: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const FilesQuerySchema = z.object({
  folder_path: z.string().default('/'),
});

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidArguments: 400,
  AuthError: 401,
  PermissionDenied: 403,
  NotFound: 404,
  AlreadyExists: 409,
  DecodeError: 422,
  TransportError: 502,
};

export function failureStatus(failure: ToolFailure): number {
  if (failure.kind === 'AuthError' && failure.reason === 'Unavailable') return 503;
  return STATUS_BY_KIND[failure.kind];
}

export interface BuildServerOptions {
  config: SharePointConfig;
  logger?: FastifyServerOptions['logger'];
  overrides?: ServiceOverrides;
}

export interface SharePointServer {
  fastify: FastifyInstance;
  services: Services;
}

function sendResult(reply: FastifyReply, result: ToolResult) {
  if (result.ok) {
    return reply.code(200).send({ success: true, result: result.payload });
  }
  return reply.code(failureStatus(result.error)).send({ success: false, error: result.error });
}

export async function buildServer(options: BuildServerOptions): Promise<SharePointServer> {
  const { config } = options;

  const fastify = Fastify({
    logger: options.logger ?? { level: config.logLevel },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'reqId',
  });

  const services = createServices(config, fastify.log, options.overrides);
  const { dispatcher, storage } = services;

  const dispatch = (request: ToolRequest) => dispatcher.dispatch(request);

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
      },
    },
  });

  await fastify.register(cors, {
    origin: config.http.corsOrigins.includes('*') ? true : [...config.http.corsOrigins],
    exposedHeaders: ['Mcp-Session-Id'],
  });

  await fastify.register(rateLimit, {
    global: true,
    max: config.http.rateLimitMax, // requests per timeWindow
    timeWindow: '1 minute',
    cache: 10000,
    allowList: ['127.0.0.1'],
  });

  fastify.get('/', async () => {
    return { message: 'SharePoint MCP Server', status: 'running', version: SERVER_VERSION };
  });

  // Health check
  fastify.get('/health', async () => {
    return {
      status: 'healthy',
      service: SERVER_NAME,
      timestamp: new Date().toISOString(),
      circuitBreakers: storage.breakerStates(),
    };
  });

  fastify.get('/tools', async () => {
    return { tools: [...TOOL_NAMES] };
  });

  // Execute a tool without an MCP client
  fastify.post('/execute', async (request, reply) => {
    const body = ExecuteRequestSchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({
        success: false,
        error: { kind: 'InvalidArguments', message: 'Body must be {"tool_name": string, "params"?: object}' },
      });
    }

    const result = await dispatch({ name: body.data.tool_name, arguments: body.data.params ?? {} });
    return sendResult(reply, result);
  });

  fastify.get('/files', async (request, reply) => {
    const query = FilesQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({
        success: false,
        error: { kind: 'InvalidArguments', message: 'Query must be {"folder_path"?: string}' },
      });
    }
    return sendResult(reply, await dispatch({ name: 'list_files', arguments: { folder_path: query.data.folder_path } }));
  });

  fastify.get('/site-info', async (_request, reply) => {
    return sendResult(reply, await dispatch({ name: 'get_site_info', arguments: {} }));
  });

  // MCP Streamable HTTP, stateless: a fresh server and transport per request
  fastify.post('/mcp', async (request, reply) => {
    const server = createMcpServer(dispatcher);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => request.log.warn({ err }, 'Failed to close MCP transport'));
      server.close().catch((err: unknown) => request.log.warn({ err }, 'Failed to close MCP server'));
    });

    await server.connect(transport);
    reply.hijack();
    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  const methodNotAllowed = async (_request: unknown, reply: FastifyReply) => {
    return reply.code(405).send({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  };
  fastify.get('/mcp', methodNotAllowed);
  fastify.delete('/mcp', methodNotAllowed);

  return { fastify, services };
}
