#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServices, loadStartupConfig } from './app.js';
import { createMcpServer } from './mcp/server.js';
import { createStderrLogger } from './observability/logger.js';

const config = loadStartupConfig();
const logger = createStderrLogger(config.logLevel);
const { dispatcher } = createServices(config, logger);
const server = createMcpServer(dispatcher);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ siteUrl: config.siteUrl }, 'SharePoint MCP server running on stdio');
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
