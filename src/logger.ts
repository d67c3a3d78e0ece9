import pino, { type Logger } from 'pino';
import config from './config/config.js';

const SERVICE_NAME = 'indian-penal-law-mcp';

// stdout belongs to the MCP transport and CLI output, so logs go to stderr.
function createRootLogger(): Logger {
  if (config.prettyLogs) {
    return pino({
      name: SERVICE_NAME,
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2 },
      },
    });
  }
  return pino({ name: SERVICE_NAME, level: config.logLevel }, pino.destination(2));
}

export const logger = createRootLogger();

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
