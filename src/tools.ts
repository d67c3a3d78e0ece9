import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CaseAnalyzer } from './analyzer/case-analyzer.js';
import { toCaseAnalysisJson } from './analyzer/serialize.js';
import { RecordValidationError } from './errors.js';
import { formatAnalysis, formatMapping, formatSection, formatSectionList, formatStatistics } from './format.js';
import { createLogger } from './logger.js';
import { CodeFamilySchema } from './schemas.js';
import { CODE_FAMILIES } from './types.js';

const log = createLogger('tools');

export const TOOLS: Tool[] = [
  {
    name: 'analyze_case',
    description:
      'Match a free-text case description against IPC and BNS 2023 sections by keyword. ' +
      'Returns matched sections, the IPC to BNS mapping and a mandatory disclaimer. Not legal advice.',
    inputSchema: {
      type: 'object',
      properties: {
        case_description: {
          type: 'string',
          description: 'Description of the facts of the case',
        },
        format: {
          type: 'string',
          description: 'Output format (default: markdown)',
          enum: ['markdown', 'json'],
          default: 'markdown',
        },
      },
      required: ['case_description'],
    },
  },
  {
    name: 'get_section',
    description: 'Retrieve a single section of a legal code by code and section number',
    inputSchema: {
      type: 'object',
      properties: {
        code: {
          type: 'string',
          description: 'Legal code (e.g., "IPC" or "BNS")',
          enum: [...CODE_FAMILIES],
        },
        section_number: {
          type: 'string',
          description: 'Section number (e.g., "302", "498A" or "3(5)")',
        },
      },
      required: ['code', 'section_number'],
    },
  },
  {
    name: 'map_ipc_to_bns',
    description: 'Find the BNS 2023 section that replaces an IPC section',
    inputSchema: {
      type: 'object',
      properties: {
        section_number: {
          type: 'string',
          description: 'IPC section number (e.g., "302")',
        },
      },
      required: ['section_number'],
    },
  },
  {
    name: 'list_sections',
    description: 'List every section of a legal code held in the database',
    inputSchema: {
      type: 'object',
      properties: {
        code: {
          type: 'string',
          description: 'Legal code (e.g., "IPC" or "BNS")',
          enum: [...CODE_FAMILIES],
        },
      },
      required: ['code'],
    },
  },
  {
    name: 'get_statistics',
    description: 'Get statistics about the statute database',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];

const AnalyzeCaseArgs = z.object({
  case_description: z.string(),
  format: z.enum(['markdown', 'json']).default('markdown'),
});

const GetSectionArgs = z.object({
  code: CodeFamilySchema,
  section_number: z.string().min(1),
});

const MapIpcToBnsArgs = z.object({
  section_number: z.string().min(1),
});

const ListSectionsArgs = z.object({
  code: CodeFamilySchema,
});

function parseArgs<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw RecordValidationError.fromZod(`arguments for ${tool}`, result.error);
  }
  return result.data;
}

function textResult(text: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

export function callTool(
  analyzer: CaseAnalyzer,
  name: string,
  args: Record<string, unknown> | undefined
): CallToolResult {
  const db = analyzer.database;
  log.debug({ tool: name }, 'tool call');

  try {
    switch (name) {
      case 'analyze_case': {
        const { case_description, format } = parseArgs(name, AnalyzeCaseArgs, args);
        const analysis = analyzer.analyze(case_description);
        log.info(
          { tool: name, length: case_description.length, matches: analysis.relevantSections.length },
          'case analyzed'
        );
        return textResult(
          format === 'json' ? JSON.stringify(toCaseAnalysisJson(analysis), null, 2) : formatAnalysis(analysis)
        );
      }

      case 'get_section': {
        const { code, section_number } = parseArgs(name, GetSectionArgs, args);
        const section = db.lookup(code, section_number);
        if (!section) {
          return textResult(`${code} ${section_number.trim()} not found in database.`);
        }
        return textResult(formatSection(section));
      }

      case 'map_ipc_to_bns': {
        const { section_number } = parseArgs(name, MapIpcToBnsArgs, args);
        const mapping = db.mapIpcToBns(section_number);
        if (!mapping) {
          return textResult(`No BNS mapping found for IPC ${section_number.trim()}.`);
        }
        return textResult(formatMapping(mapping, db.lookup(mapping.newCode, mapping.newSection)));
      }

      case 'list_sections': {
        const { code } = parseArgs(name, ListSectionsArgs, args);
        const sections = db.allOfCodeFamily(code);
        if (sections.length === 0) {
          return textResult(`No sections found for ${code}`);
        }
        return textResult(formatSectionList(code, sections));
      }

      case 'get_statistics':
        return textResult(formatStatistics(db.getStatistics()));

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ tool: name, err: error }, 'tool call failed');
    return {
      ...textResult(`Error: ${message}`),
      isError: true,
    };
  }
}
