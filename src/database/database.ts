import type Database from 'better-sqlite3';
import { RecordValidationError } from '../errors.js';
import {
  OLD_CODE,
  NEW_CODE,
  isCodeFamily,
  isMappingStatus,
  type CodeFamily,
  type LawStatistics,
  type LegalMapping,
  type LegalSection,
  type StatuteTables,
} from '../types.js';
import { initializeDatabase } from './init.js';
import { loadStatuteTables, validateStatuteTables } from './statute-data.js';

interface SectionRow {
  code: string;
  sectionNumber: string;
  title: string;
  description: string;
  punishment: string | null;
  bailable: number | null;
}

interface MappingRow {
  oldCode: string;
  oldSection: string;
  newCode: string;
  newSection: string;
  status: string;
}

const SECTION_COLUMNS = `
  code,
  section_number as sectionNumber,
  title,
  description,
  punishment,
  bailable
`;

const MAPPING_COLUMNS = `
  old_code as oldCode,
  old_section as oldSection,
  new_code as newCode,
  new_section as newSection,
  status
`;

function toCodeFamily(value: string): CodeFamily {
  if (!isCodeFamily(value)) {
    throw new RecordValidationError('database row', [`unknown code family "${value}"`]);
  }
  return value;
}

function rowToSection(row: SectionRow): LegalSection {
  return {
    code: toCodeFamily(row.code),
    sectionNumber: row.sectionNumber,
    title: row.title,
    description: row.description,
    punishment: row.punishment,
    bailable: row.bailable === null ? null : row.bailable === 1,
  };
}

function rowToMapping(row: MappingRow): LegalMapping {
  if (!isMappingStatus(row.status)) {
    throw new RecordValidationError('database row', [`unknown mapping status "${row.status}"`]);
  }
  return {
    oldCode: toCodeFamily(row.oldCode),
    oldSection: row.oldSection,
    newCode: toCodeFamily(row.newCode),
    newSection: row.newSection,
    status: row.status,
  };
}

/**
 * Read-only store of IPC and BNS sections and the IPC → BNS mapping.
 *
 * Every lookup returns `null` for unknown input; nothing here throws for a miss.
 * Construction throws RecordValidationError for duplicate or blank section numbers.
 */
export class LegalCodeDatabase {
  private db: Database.Database;
  private lookupStmt: Database.Statement<[string, string], SectionRow>;
  private mappingStmt: Database.Statement<[string, string], MappingRow>;
  private codeFamilyStmt: Database.Statement<[string], SectionRow>;

  constructor(tables: StatuteTables = loadStatuteTables()) {
    this.db = initializeDatabase(validateStatuteTables(tables));

    this.lookupStmt = this.db.prepare<[string, string], SectionRow>(`
      SELECT ${SECTION_COLUMNS}
      FROM sections
      WHERE code = ? AND section_number = ?
    `);

    this.mappingStmt = this.db.prepare<[string, string], MappingRow>(`
      SELECT ${MAPPING_COLUMNS}
      FROM mappings
      WHERE old_code = ? AND old_section = ?
    `);

    this.codeFamilyStmt = this.db.prepare<[string], SectionRow>(`
      SELECT ${SECTION_COLUMNS}
      FROM sections
      WHERE code = ?
      ORDER BY id
    `);
  }

  lookup(code: CodeFamily, sectionNumber: string): LegalSection | null {
    const row = this.lookupStmt.get(code, sectionNumber.trim());
    return row ? rowToSection(row) : null;
  }

  lookupIpc(sectionNumber: string): LegalSection | null {
    return this.lookup(OLD_CODE, sectionNumber);
  }

  lookupBns(sectionNumber: string): LegalSection | null {
    return this.lookup(NEW_CODE, sectionNumber);
  }

  /** Section numbers carry letters (498A, 304B), so the match is case-sensitive. */
  mapToNewCode(oldSection: string, oldCode: CodeFamily = OLD_CODE): LegalMapping | null {
    const row = this.mappingStmt.get(oldCode, oldSection.trim());
    return row ? rowToMapping(row) : null;
  }

  mapIpcToBns(ipcSection: string): LegalMapping | null {
    return this.mapToNewCode(ipcSection, OLD_CODE);
  }

  allOfCodeFamily(code: CodeFamily): LegalSection[] {
    return this.codeFamilyStmt.all(code).map(rowToSection);
  }

  allIpc(): LegalSection[] {
    return this.allOfCodeFamily(OLD_CODE);
  }

  allBns(): LegalSection[] {
    return this.allOfCodeFamily(NEW_CODE);
  }

  allMappings(): LegalMapping[] {
    const stmt = this.db.prepare<[], MappingRow>(`
      SELECT ${MAPPING_COLUMNS}
      FROM mappings
      ORDER BY id
    `);
    return stmt.all().map(rowToMapping);
  }

  getStatistics(): LawStatistics {
    const counts = this.db
      .prepare<[], { code: string; count: number }>(`
        SELECT code, COUNT(*) as count
        FROM sections
        GROUP BY code
        ORDER BY code
      `)
      .all();

    const totals = this.db
      .prepare<[], { mappingCount: number; loadedAt: string | null }>(`
        SELECT
          (SELECT COUNT(*) FROM mappings) as mappingCount,
          (SELECT value FROM metadata WHERE key = 'loaded_at') as loadedAt
      `)
      .get();

    const sectionCounts: Partial<Record<CodeFamily, number>> = {};
    for (const { code, count } of counts) {
      sectionCounts[toCodeFamily(code)] = count;
    }

    return {
      sectionCounts,
      mappingCount: totals?.mappingCount ?? 0,
      loadedAt: totals?.loadedAt ?? 'Unknown',
    };
  }

  close(): void {
    this.db.close();
  }
}

let shared: LegalCodeDatabase | undefined;

/** Process-wide store, built on first use from the configured data directory. */
export function getSharedDatabase(): LegalCodeDatabase {
  shared ??= new LegalCodeDatabase();
  return shared;
}
