import type { FastifyPluginAsync } from 'fastify';
import { Type, type Static } from '@sinclair/typebox';
import { toMappingJson, toSectionJson } from '../../analyzer/serialize.js';
import type { MappingJson, SectionJson } from '../../schemas.js';
import { CodeFamilyParam, ErrorSchema, MappingSchema, SectionSchema, notFound, type ErrorBody } from '../schemas.js';
import type { RoutesOptions } from './index.js';

const CodeParamsSchema = Type.Object({
  code: CodeFamilyParam,
});
type CodeParams = Static<typeof CodeParamsSchema>;

const SectionParamsSchema = Type.Object({
  code: CodeFamilyParam,
  number: Type.String({ minLength: 1, description: 'Section number, e.g. 302 or 498A' }),
});
type SectionParams = Static<typeof SectionParamsSchema>;

const MappingParamsSchema = Type.Object({
  section: Type.String({ minLength: 1, description: 'IPC section number' }),
});
type MappingParams = Static<typeof MappingParamsSchema>;

const sectionEndpoints: FastifyPluginAsync<RoutesOptions> = async (fastify, { analyzer }) => {
  const db = analyzer.database;

  fastify.get<{ Params: CodeParams; Reply: { code: string; sections: SectionJson[] } }>(
    '/sections/:code',
    {
      schema: {
        description: 'List every section of a legal code.',
        tags: ['Sections'],
        params: CodeParamsSchema,
        response: {
          200: Type.Object({ code: Type.String(), sections: Type.Array(SectionSchema) }),
        },
      },
    },
    async (request) => {
      const { code } = request.params;
      return { code, sections: db.allOfCodeFamily(code).map(toSectionJson) };
    }
  );

  fastify.get<{ Params: SectionParams; Reply: SectionJson | ErrorBody }>(
    '/sections/:code/:number',
    {
      schema: {
        description: 'Retrieve a single section by code and number.',
        tags: ['Sections'],
        params: SectionParamsSchema,
        response: {
          200: SectionSchema,
          404: ErrorSchema,
        },
      },
    },
    async (request, reply) => {
      const { code, number } = request.params;
      const section = db.lookup(code, number);
      if (!section) {
        reply.code(404);
        return notFound(`${code} ${number.trim()} not found in database.`);
      }
      return toSectionJson(section);
    }
  );

  fastify.get<{ Params: MappingParams; Reply: MappingJson | ErrorBody }>(
    '/mappings/:section',
    {
      schema: {
        description: 'Find the BNS 2023 section that replaces an IPC section.',
        tags: ['Mappings'],
        params: MappingParamsSchema,
        response: {
          200: MappingSchema,
          404: ErrorSchema,
        },
      },
    },
    async (request, reply) => {
      const { section } = request.params;
      const mapping = db.mapIpcToBns(section);
      if (!mapping) {
        reply.code(404);
        return notFound(`No BNS mapping found for IPC ${section.trim()}.`);
      }
      return toMappingJson(mapping);
    }
  );
};

export default sectionEndpoints;
