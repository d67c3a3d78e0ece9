import { Type, type Static } from '@sinclair/typebox';
import { CODE_FAMILIES, MAPPING_STATUSES, type CodeFamily, type MappingStatus } from '../types.js';

export const CodeFamilyParam = Type.Unsafe<CodeFamily>({
  type: 'string',
  enum: [...CODE_FAMILIES],
  description: 'Legal code, e.g. IPC or BNS',
});

const MappingStatusValue = Type.Unsafe<MappingStatus>({
  type: 'string',
  enum: [...MAPPING_STATUSES],
});

export const SectionSchema = Type.Object({
  code: CodeFamilyParam,
  section_number: Type.String(),
  title: Type.String(),
  description: Type.String(),
  punishment: Type.Union([Type.String(), Type.Null()]),
  bailable: Type.Union([Type.Boolean(), Type.Null()]),
});

export const MappingSchema = Type.Object({
  old_code: CodeFamilyParam,
  old_section: Type.String(),
  new_code: CodeFamilyParam,
  new_section: Type.String(),
  status: MappingStatusValue,
});

export const CaseAnalysisSchema = Type.Object({
  case_description: Type.String(),
  relevant_sections: Type.Array(SectionSchema),
  ipc_to_bns_mapping: Type.Array(
    Type.Object({
      ipc: Type.String(),
      bns: Type.String(),
      status: MappingStatusValue,
    })
  ),
  summary: Type.String(),
  disclaimer: Type.String(),
});

export const ErrorSchema = Type.Object({
  statusCode: Type.Number(),
  error: Type.String(),
  message: Type.String(),
});
export type ErrorBody = Static<typeof ErrorSchema>;

export function notFound(message: string): ErrorBody {
  return { statusCode: 404, error: 'Not Found', message };
}
