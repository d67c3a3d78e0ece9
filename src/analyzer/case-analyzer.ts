import { LegalCodeDatabase, getSharedDatabase } from '../database/database.js';
import { sectionId } from '../database/statute-data.js';
import { NEW_CODE, OLD_CODE, type CaseAnalysis, type KeywordRule, type LegalSection, type MappingSummary } from '../types.js';
import { getKeywordRules } from './keyword-rules.js';

export const LEGAL_DISCLAIMER =
  'This tool does NOT provide legal advice.' +
  ' Case analysis is based on keyword matching and may be incomplete or inaccurate.' +
  ' Always consult a qualified legal professional.';

export const NO_MATCH_SUMMARY =
  'No specific IPC/BNS sections could be matched to the case description.' +
  ' The case may involve civil law, special statutes, or requires more detail.' +
  ' Consult a qualified advocate for proper legal analysis.';

export const BNS_TRANSITION_NOTE =
  'Note: The Bharatiya Nyaya Sanhita (BNS) 2023 replaced the IPC from 1 July 2024.' +
  ' New cases are charged under BNS; old cases under IPC.';

export interface CaseAnalyzerOptions {
  database?: LegalCodeDatabase;
  rules?: readonly KeywordRule[];
}

/**
 * Matches case descriptions against the keyword rule table.
 *
 * Keywords are plain substrings of the lower-cased text with no word
 * boundaries, so "grapes" fires the rape rule. Downstream documentation
 * describes this behaviour; keep it.
 */
export class CaseAnalyzer {
  private readonly db: LegalCodeDatabase;
  private readonly rules: readonly KeywordRule[];

  constructor(options: CaseAnalyzerOptions = {}) {
    this.db = options.database ?? getSharedDatabase();
    this.rules = options.rules ?? getKeywordRules();
  }

  get database(): LegalCodeDatabase {
    return this.db;
  }

  analyze(caseDescription: string): CaseAnalysis {
    const text = caseDescription.toLowerCase();
    const relevantSections: LegalSection[] = [];
    const ipcToBnsMapping: MappingSummary[] = [];
    const categories: string[] = [];
    const seenSections = new Set<string>();
    const seenMappings = new Set<string>();

    for (const rule of this.rules) {
      if (!rule.keywords.some((keyword) => text.includes(keyword))) {
        continue;
      }
      if (!categories.includes(rule.category)) {
        categories.push(rule.category);
      }

      for (const ref of rule.sections) {
        const section = this.db.lookup(ref.code, ref.number);
        if (!section) {
          continue;
        }
        const id = sectionId(section.code, section.sectionNumber);
        if (seenSections.has(id)) {
          continue;
        }
        seenSections.add(id);
        relevantSections.push(section);

        if (section.code !== OLD_CODE || seenMappings.has(id)) {
          continue;
        }
        const mapping = this.db.mapToNewCode(section.sectionNumber);
        if (mapping) {
          seenMappings.add(id);
          ipcToBnsMapping.push({
            ipc: `${mapping.oldCode} ${mapping.oldSection}`,
            bns: `${mapping.newCode} ${mapping.newSection}`,
            status: mapping.status,
          });
        }
      }
    }

    return {
      caseDescription,
      relevantSections,
      ipcToBnsMapping,
      summary: summarize(relevantSections, categories),
      disclaimer: LEGAL_DISCLAIMER,
    };
  }
}

function summarize(sections: LegalSection[], categories: string[]): string {
  if (sections.length === 0) {
    return NO_MATCH_SUMMARY;
  }

  const ipcRefs = sections.filter((s) => s.code === OLD_CODE).map((s) => s.sectionNumber);
  const bnsRefs = sections.filter((s) => s.code === NEW_CODE).map((s) => s.sectionNumber);

  let summary = `The case potentially involves the following offences: ${categories.join(', ')}. `;
  if (ipcRefs.length > 0) {
    summary += `Relevant IPC sections: ${ipcRefs.join(', ')}. `;
  }
  if (bnsRefs.length > 0) {
    summary += `Corresponding BNS 2023 sections: ${bnsRefs.join(', ')}. `;
  }
  return summary + BNS_TRANSITION_NOTE;
}
