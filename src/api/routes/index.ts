import type { FastifyPluginAsync } from 'fastify';
import type { CaseAnalyzer } from '../../analyzer/case-analyzer.js';
import analyzeEndpoint from './analyze.js';
import sectionEndpoints from './sections.js';

export interface RoutesOptions {
  analyzer: CaseAnalyzer;
}

const routes: FastifyPluginAsync<RoutesOptions> = async (fastify, { analyzer }) => {
  await fastify.register(analyzeEndpoint, { analyzer });
  await fastify.register(sectionEndpoints, { analyzer });
};

export default routes;
