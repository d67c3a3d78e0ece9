#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { LEGAL_DISCLAIMER } from './analyzer/case-analyzer.js';
import { logger } from './logger.js';
import { createMcpServer } from './server.js';

async function main() {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ disclaimer: LEGAL_DISCLAIMER }, 'Indian Penal Law MCP Server started');
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Server error');
  process.exit(1);
});
