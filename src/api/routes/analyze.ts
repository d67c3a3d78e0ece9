import type { FastifyPluginAsync } from 'fastify';
import { Type, type Static } from '@sinclair/typebox';
import { toCaseAnalysisJson } from '../../analyzer/serialize.js';
import type { CaseAnalysisJson } from '../../schemas.js';
import { CaseAnalysisSchema, ErrorSchema } from '../schemas.js';
import type { RoutesOptions } from './index.js';

const AnalyzeBodySchema = Type.Object({
  case_description: Type.String({ description: 'Free-text description of the case facts.' }),
});

type AnalyzeBody = Static<typeof AnalyzeBodySchema>;

const analyzeEndpoint: FastifyPluginAsync<RoutesOptions> = async (fastify, { analyzer }) => {
  fastify.post<{ Body: AnalyzeBody; Reply: CaseAnalysisJson }>(
    '/analyze',
    {
      schema: {
        description: 'Match a case description against IPC and BNS sections by keyword.',
        tags: ['Analysis'],
        body: AnalyzeBodySchema,
        response: {
          200: CaseAnalysisSchema,
          400: ErrorSchema,
        },
      },
    },
    async (request) => {
      const { case_description } = request.body;
      const analysis = analyzer.analyze(case_description);
      request.log.info(
        { length: case_description.length, matches: analysis.relevantSections.length },
        'case analyzed'
      );
      return toCaseAnalysisJson(analysis);
    }
  );
};

export default analyzeEndpoint;
