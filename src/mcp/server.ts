/**
 * MCP server wiring shared by the stdio and Streamable HTTP transports
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { tools } from '../tools/definitions.js';
import type { ToolDispatcher, ToolResult } from '../tools/dispatcher.js';
import { renderFailure, renderPayload } from '../tools/render.js';

export const SERVER_NAME = 'sharepoint-mcp-server';
export const SERVER_VERSION = '1.0.0';

const FILES_RESOURCE_URI = 'sharepoint://files';

export function toCallToolResult(result: ToolResult): CallToolResult {
  if (result.ok) {
    return { content: [{ type: 'text', text: renderPayload(result.payload) }] };
  }
  return { content: [{ type: 'text', text: renderFailure(result.error) }], isError: true };
}

/**
 * Create an MCP server whose tool calls go through the dispatcher
 */
export function createMcpServer(dispatcher: ToolDispatcher): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    const result = await dispatcher.dispatch({ name, arguments: args });
    return toCallToolResult(result);
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [
      {
        uri: FILES_RESOURCE_URI,
        name: 'SharePoint Files',
        description: 'Files and folders at the root of the document library',
        mimeType: 'application/json',
      },
    ],
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    if (uri !== FILES_RESOURCE_URI) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }

    const result = await dispatcher.dispatch({ name: 'list_files', arguments: { folder_path: '/' } });
    const text = result.ok ? renderPayload(result.payload) : renderFailure(result.error);
    return { contents: [{ uri, mimeType: 'application/json', text }] };
  });

  return server;
}
