import pino from 'pino';
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { CaseAnalyzer } from '../analyzer/case-analyzer.js';
import config from '../config/config.js';
import routes from './routes/index.js';

export interface HttpServerOptions {
  analyzer?: CaseAnalyzer;
  logger?: FastifyServerOptions['logger'];
}

// Request logs share stderr with the application logger.
export function httpLoggerOptions(): FastifyServerOptions['logger'] {
  if (config.prettyLogs) {
    return {
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2 },
      },
    };
  }
  return { level: config.logLevel, stream: pino.destination(2) };
}

export async function createHttpServer(options: HttpServerOptions = {}): Promise<FastifyInstance> {
  const analyzer = options.analyzer ?? new CaseAnalyzer();

  const server = Fastify({
    logger: options.logger ?? httpLoggerOptions(),
  });

  await server.register(routes, { prefix: '/api', analyzer });

  server.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  return server;
}
