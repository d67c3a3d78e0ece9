import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { CaseAnalyzer } from './analyzer/case-analyzer.js';
import { formatStatistics } from './format.js';
import { TOOLS, callTool } from './tools.js';

export const SERVER_NAME = 'indian-penal-law-mcp';
export const SERVER_VERSION = '1.0.0';
export const STATISTICS_URI = 'law://india/statistics';

export interface McpServerOptions {
  analyzer?: CaseAnalyzer;
}

export function createMcpServer(options: McpServerOptions = {}): Server {
  const analyzer = options.analyzer ?? new CaseAnalyzer();

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
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(analyzer, name, args);
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    const stats = analyzer.database.getStatistics();
    const ipc = stats.sectionCounts.IPC ?? 0;
    const bns = stats.sectionCounts.BNS ?? 0;

    return {
      resources: [
        {
          uri: STATISTICS_URI,
          name: 'Indian Penal Law Database Statistics',
          description: `In-memory database with ${ipc} IPC sections, ${bns} BNS sections and ${stats.mappingCount} mappings`,
          mimeType: 'text/plain',
        },
      ],
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    if (uri === STATISTICS_URI) {
      return {
        contents: [
          {
            uri,
            mimeType: 'text/plain',
            text: formatStatistics(analyzer.database.getStatistics()),
          },
        ],
      };
    }

    throw new Error(`Unknown resource: ${uri}`);
  });

  return server;
}
