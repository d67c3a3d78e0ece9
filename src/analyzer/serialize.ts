import { parseCaseAnalysisRecord, sectionFromJson, type CaseAnalysisJson, type MappingJson, type SectionJson } from '../schemas.js';
import type { CaseAnalysis, LegalMapping, LegalSection } from '../types.js';

export function toSectionJson(section: LegalSection): SectionJson {
  return {
    code: section.code,
    section_number: section.sectionNumber,
    title: section.title,
    description: section.description,
    punishment: section.punishment,
    bailable: section.bailable,
  };
}

export function toMappingJson(mapping: LegalMapping): MappingJson {
  return {
    old_code: mapping.oldCode,
    old_section: mapping.oldSection,
    new_code: mapping.newCode,
    new_section: mapping.newSection,
    status: mapping.status,
  };
}

export function toCaseAnalysisJson(analysis: CaseAnalysis): CaseAnalysisJson {
  return {
    case_description: analysis.caseDescription,
    relevant_sections: analysis.relevantSections.map(toSectionJson),
    ipc_to_bns_mapping: analysis.ipcToBnsMapping.map(({ ipc, bns, status }) => ({ ipc, bns, status })),
    summary: analysis.summary,
    disclaimer: analysis.disclaimer,
  };
}

/** Rebuilds a CaseAnalysis from its JSON shape; throws RecordValidationError on bad input. */
export function parseCaseAnalysisJson(input: unknown): CaseAnalysis {
  const json = parseCaseAnalysisRecord(input);
  return {
    caseDescription: json.case_description,
    relevantSections: json.relevant_sections.map(sectionFromJson),
    ipcToBnsMapping: json.ipc_to_bns_mapping,
    summary: json.summary,
    disclaimer: json.disclaimer,
  };
}
