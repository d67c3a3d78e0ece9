import { z } from 'zod';
import { RecordValidationError } from './errors.js';
import {
  CODE_FAMILIES,
  MAPPING_STATUSES,
  isCodeFamily,
  type KeywordRule,
  type LegalMapping,
  type LegalSection,
  type SectionRef,
} from './types.js';

export const CodeFamilySchema = z.enum(CODE_FAMILIES);
export const MappingStatusSchema = z.enum(MAPPING_STATUSES);

// Wire shape of a section. Data files may omit punishment/bailable; both come out as null.
export const SectionJsonSchema = z.object({
  code: CodeFamilySchema,
  section_number: z.string().trim().min(1),
  title: z.string().min(1),
  description: z.string(),
  punishment: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  bailable: z
    .boolean()
    .nullish()
    .transform((value) => value ?? null),
});
export type SectionJson = z.infer<typeof SectionJsonSchema>;

export const MappingJsonSchema = z.object({
  old_code: CodeFamilySchema,
  old_section: z.string().trim().min(1),
  new_code: CodeFamilySchema,
  new_section: z.string().trim().min(1),
  status: MappingStatusSchema,
});
export type MappingJson = z.infer<typeof MappingJsonSchema>;

export const MappingSummarySchema = z.object({
  ipc: z.string().min(1),
  bns: z.string().min(1),
  status: MappingStatusSchema,
});

export const CaseAnalysisJsonSchema = z.object({
  case_description: z.string(),
  relevant_sections: z.array(SectionJsonSchema),
  ipc_to_bns_mapping: z.array(MappingSummarySchema),
  summary: z.string(),
  disclaimer: z.string().min(1),
});
export type CaseAnalysisJson = z.infer<typeof CaseAnalysisJsonSchema>;

const SectionRefSchema = z.string().transform((value, ctx): SectionRef => {
  const separator = value.indexOf(':');
  const code = separator > 0 ? value.slice(0, separator) : '';
  const number = separator > 0 ? value.slice(separator + 1).trim() : '';
  if (!isCodeFamily(code) || number === '') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected a CODE:number section reference, got "${value}"`,
    });
    return z.NEVER;
  }
  return { code, number };
});

export const KeywordRuleSchema = z.object({
  category: z.string().min(1),
  keywords: z
    .array(
      z
        .string()
        .min(1)
        .transform((keyword) => keyword.toLowerCase())
    )
    .min(1),
  sections: z.array(SectionRefSchema).min(1),
});

export function sectionFromJson(json: SectionJson): LegalSection {
  return {
    code: json.code,
    sectionNumber: json.section_number,
    title: json.title,
    description: json.description,
    punishment: json.punishment,
    bailable: json.bailable,
  };
}

export function mappingFromJson(json: MappingJson): LegalMapping {
  return {
    oldCode: json.old_code,
    oldSection: json.old_section,
    newCode: json.new_code,
    newSection: json.new_section,
    status: json.status,
  };
}

function parseWith<S extends z.ZodTypeAny>(schema: S, source: string, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw RecordValidationError.fromZod(source, result.error);
  }
  return result.data;
}

export function parseLegalSection(input: unknown, source = 'legal section'): LegalSection {
  return sectionFromJson(parseWith(SectionJsonSchema, source, input));
}

export function parseLegalMapping(input: unknown, source = 'legal mapping'): LegalMapping {
  return mappingFromJson(parseWith(MappingJsonSchema, source, input));
}

export function parseLegalSections(input: unknown, source = 'legal sections'): LegalSection[] {
  return parseWith(z.array(SectionJsonSchema), source, input).map(sectionFromJson);
}

export function parseLegalMappings(input: unknown, source = 'legal mappings'): LegalMapping[] {
  return parseWith(z.array(MappingJsonSchema), source, input).map(mappingFromJson);
}

export function parseKeywordRules(input: unknown, source = 'keyword rules'): KeywordRule[] {
  return parseWith(z.array(KeywordRuleSchema), source, input);
}

export function parseCaseAnalysisRecord(input: unknown, source = 'case analysis'): CaseAnalysisJson {
  return parseWith(CaseAnalysisJsonSchema, source, input);
}
