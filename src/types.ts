export const CODE_FAMILIES = ['IPC', 'BNS', 'CrPC', 'BNSS', 'IT Act', 'POCSO'] as const;
export type CodeFamily = (typeof CODE_FAMILIES)[number];

export const MAPPING_STATUSES = ['replaced', 'amended', 'repealed'] as const;
export type MappingStatus = (typeof MAPPING_STATUSES)[number];

export const OLD_CODE: CodeFamily = 'IPC';
export const NEW_CODE: CodeFamily = 'BNS';

export function isCodeFamily(value: string): value is CodeFamily {
  return CODE_FAMILIES.some((code) => code === value);
}

export function isMappingStatus(value: string): value is MappingStatus {
  return MAPPING_STATUSES.some((status) => status === value);
}

export interface LegalSection {
  code: CodeFamily;
  sectionNumber: string;
  title: string;
  description: string;
  punishment: string | null;
  /** null when bail depends on the underlying offence */
  bailable: boolean | null;
}

export interface LegalMapping {
  oldCode: CodeFamily;
  oldSection: string;
  newCode: CodeFamily;
  newSection: string;
  status: MappingStatus;
}

export interface SectionRef {
  code: CodeFamily;
  number: string;
}

export interface KeywordRule {
  keywords: string[];
  sections: SectionRef[];
  category: string;
}

export interface MappingSummary {
  ipc: string;
  bns: string;
  status: MappingStatus;
}

export interface CaseAnalysis {
  caseDescription: string;
  relevantSections: LegalSection[];
  ipcToBnsMapping: MappingSummary[];
  summary: string;
  disclaimer: string;
}

export interface StatuteTables {
  sections: LegalSection[];
  mappings: LegalMapping[];
}

export interface LawStatistics {
  sectionCounts: Partial<Record<CodeFamily, number>>;
  mappingCount: number;
  loadedAt: string;
}
