#!/usr/bin/env node

import { existsSync, realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { parseArgs } from 'util';
import { CaseAnalyzer, LEGAL_DISCLAIMER } from './analyzer/case-analyzer.js';
import { toCaseAnalysisJson } from './analyzer/serialize.js';
import { createHttpServer } from './api/server.js';
import config from './config/config.js';
import { formatAnalysis, formatMapping, formatSection, formatSectionList } from './format.js';
import { logger } from './logger.js';
import { SERVER_VERSION } from './server.js';
import { CODE_FAMILIES, type CodeFamily } from './types.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const USAGE = `Usage: indian-penal-law <command> [options]

Commands:
  analyze <text> [--json]    Match a case description against IPC and BNS sections
  lookup <code> <number>     Show a single section (code: ${CODE_FAMILIES.join(', ')})
  map <ipc-number>           Show the BNS section that replaces an IPC section
  list <code>                List every section of a code
  serve [--host] [--port]    Start the HTTP API server

Options:
  -h, --help                 Show this help
  -v, --version              Show the version`;

const EXIT_OK = 0;
const EXIT_NOT_FOUND = 1;
const EXIT_USAGE = 2;

/** Codes are matched case-insensitively, so "ipc" and "crpc" work on the command line. */
export function resolveCodeFamily(input: string): CodeFamily | null {
  const wanted = input.trim().toLowerCase();
  return CODE_FAMILIES.find((code) => code.toLowerCase() === wanted) ?? null;
}

function usageError(io: CliIO, message: string): number {
  io.err(`Error: ${message}`);
  io.err(USAGE);
  return EXIT_USAGE;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      json: { type: 'boolean' },
      host: { type: 'string' },
      port: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });
}

export async function runCli(
  argv: string[],
  io: CliIO = defaultIO,
  createAnalyzer: () => CaseAnalyzer = () => new CaseAnalyzer()
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    return usageError(io, error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;

  if (values.version) {
    io.out(SERVER_VERSION);
    return EXIT_OK;
  }
  if (values.help || !command) {
    io.out(USAGE);
    return EXIT_OK;
  }

  switch (command) {
    case 'analyze': {
      if (rest.length === 0) {
        return usageError(io, 'analyze needs a case description');
      }
      // An empty description is analyzed like any other and gets the no-match summary.
      const text = rest.join(' ');
      const analysis = createAnalyzer().analyze(text);
      io.out(values.json ? JSON.stringify(toCaseAnalysisJson(analysis), null, 2) : formatAnalysis(analysis));
      return EXIT_OK;
    }

    case 'lookup': {
      const [codeArg, number] = rest;
      if (!codeArg || !number) {
        return usageError(io, 'lookup needs a code and a section number');
      }
      const code = resolveCodeFamily(codeArg);
      if (!code) {
        return usageError(io, `unknown code "${codeArg}"`);
      }
      const section = createAnalyzer().database.lookup(code, number);
      if (!section) {
        io.err(`${code} ${number.trim()} not found in database.`);
        return EXIT_NOT_FOUND;
      }
      io.out(formatSection(section));
      return EXIT_OK;
    }

    case 'map': {
      const [number] = rest;
      if (!number) {
        return usageError(io, 'map needs an IPC section number');
      }
      const db = createAnalyzer().database;
      const mapping = db.mapIpcToBns(number);
      if (!mapping) {
        io.err(`No BNS mapping found for IPC ${number.trim()}.`);
        return EXIT_NOT_FOUND;
      }
      io.out(formatMapping(mapping, db.lookup(mapping.newCode, mapping.newSection)));
      return EXIT_OK;
    }

    case 'list': {
      const [codeArg] = rest;
      const code = codeArg ? resolveCodeFamily(codeArg) : null;
      if (!code) {
        return usageError(io, `list needs a code (${CODE_FAMILIES.join(', ')})`);
      }
      const sections = createAnalyzer().database.allOfCodeFamily(code);
      if (sections.length === 0) {
        io.err(`No sections found for ${code}`);
        return EXIT_NOT_FOUND;
      }
      io.out(formatSectionList(code, sections));
      return EXIT_OK;
    }

    case 'serve': {
      const host = values.host ?? config.http.host;
      const port = values.port === undefined ? config.http.port : Number(values.port);
      if (values.port?.trim() === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
        return usageError(io, `invalid port "${values.port}"`);
      }

      io.out(`\nDISCLAIMER: ${LEGAL_DISCLAIMER}\n`);
      const server = await createHttpServer({ analyzer: createAnalyzer() });
      await server.listen({ host, port });

      const shutdown = (signal: string) => {
        logger.info({ signal }, 'shutting down HTTP server');
        server.close().then(
          () => process.exit(EXIT_OK),
          (error: unknown) => {
            logger.error({ err: error }, 'HTTP server failed to close');
            process.exit(1);
          }
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
      return EXIT_OK;
    }

    default:
      return usageError(io, `unknown command "${command}"`);
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry || !existsSync(entry)) {
    return false;
  }
  return import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

if (isMainModule()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ err: error }, 'CLI error');
      process.exit(1);
    });
}
