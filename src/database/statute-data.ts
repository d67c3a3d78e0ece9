import { readFileSync } from 'fs';
import { join } from 'path';
import config from '../config/config.js';
import { RecordValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import { parseLegalMappings, parseLegalSections } from '../schemas.js';
import type { LegalMapping, LegalSection, StatuteTables } from '../types.js';

const log = createLogger('statute-data');

export const SECTION_FILES = ['ipc-sections.json', 'bns-sections.json'] as const;
export const MAPPING_FILE = 'ipc-bns-mappings.json';
export const KEYWORD_RULES_FILE = 'keyword-rules.json';

export function readDataFile(dataDir: string, fileName: string): unknown {
  const path = join(dataDir, fileName);
  const raw = readFileSync(path, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RecordValidationError(fileName, [message]);
  }
}

export function sectionId(code: string, sectionNumber: string): string {
  return `${code} ${sectionNumber}`;
}

function assertUniqueSections(sections: LegalSection[], source: string): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const section of sections) {
    const id = sectionId(section.code, section.sectionNumber);
    if (seen.has(id)) {
      duplicates.push(`duplicate section ${id}`);
    }
    seen.add(id);
  }
  if (duplicates.length > 0) {
    throw new RecordValidationError(source, duplicates);
  }
}

function assertUniqueMappings(mappings: LegalMapping[], source: string): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const mapping of mappings) {
    const id = sectionId(mapping.oldCode, mapping.oldSection);
    if (seen.has(id)) {
      duplicates.push(`duplicate mapping for ${id}`);
    }
    seen.add(id);
  }
  if (duplicates.length > 0) {
    throw new RecordValidationError(source, duplicates);
  }
}

function trimSection(section: LegalSection): LegalSection {
  return { ...section, sectionNumber: section.sectionNumber.trim() };
}

function trimMapping(mapping: LegalMapping): LegalMapping {
  return { ...mapping, oldSection: mapping.oldSection.trim(), newSection: mapping.newSection.trim() };
}

/**
 * Normalizes section numbers and rejects blank numbers or duplicate keys.
 * Every store is built from tables that went through here.
 */
export function validateStatuteTables(tables: StatuteTables, source = 'statute tables'): StatuteTables {
  const sections = tables.sections.map(trimSection);
  const mappings = tables.mappings.map(trimMapping);

  const blank = [
    ...sections.filter((s) => s.sectionNumber === '').map((s) => `blank section number in ${s.code}`),
    ...mappings
      .filter((m) => m.oldSection === '' || m.newSection === '')
      .map((m) => `blank section number in mapping ${m.oldCode} -> ${m.newCode}`),
  ];
  if (blank.length > 0) {
    throw new RecordValidationError(source, blank);
  }

  assertUniqueSections(sections, source);
  assertUniqueMappings(mappings, source);
  return { sections, mappings };
}

/**
 * Validates raw section and mapping records. Throws RecordValidationError on an
 * unknown code family or status, a missing field, or a duplicate key.
 */
export function parseStatuteTables(
  raw: { sections: unknown; mappings: unknown },
  source = 'statute tables'
): StatuteTables {
  const sections = parseLegalSections(raw.sections, `${source} (sections)`);
  const mappings = parseLegalMappings(raw.mappings, `${source} (mappings)`);
  return validateStatuteTables({ sections, mappings }, source);
}

export function loadStatuteTables(dataDir: string = config.paths.dataDir): StatuteTables {
  const sections: LegalSection[] = [];
  for (const fileName of SECTION_FILES) {
    sections.push(...parseLegalSections(readDataFile(dataDir, fileName), fileName));
  }
  const mappings = parseLegalMappings(readDataFile(dataDir, MAPPING_FILE), MAPPING_FILE);

  const tables = validateStatuteTables({ sections, mappings }, dataDir);
  log.debug({ dataDir, sections: sections.length, mappings: mappings.length }, 'statute tables loaded');
  return tables;
}
