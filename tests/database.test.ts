/**
 * Statute store tests
 *
 * Run: npx vitest run tests/database.test.ts
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { LegalCodeDatabase, getSharedDatabase } from '../src/database/database.js';
import { loadStatuteTables } from '../src/database/statute-data.js';
import { RecordValidationError } from '../src/errors.js';
import { MAPPING_STATUSES, type LegalSection } from '../src/types.js';

describe('LegalCodeDatabase', () => {
  const tables = loadStatuteTables();
  let db: LegalCodeDatabase;

  beforeAll(() => {
    db = new LegalCodeDatabase(tables);
  });

  afterAll(() => {
    db.close();
  });

  // ================================================================
  // LOOKUP
  // ================================================================

  it('finds every bundled section by (code, number)', () => {
    for (const section of tables.sections) {
      expect(db.lookup(section.code, section.sectionNumber)).toEqual(section);
    }
  });

  it('looks up IPC 302 as a non-bailable murder section', () => {
    const section = db.lookupIpc('302');
    expect(section).not.toBeNull();
    expect(section?.title).toBe('Murder');
    expect(section?.bailable).toBe(false);
    expect(section?.punishment).toBe('Death or life imprisonment and fine');
  });

  it('keeps the unknown bailable state of IPC 120B', () => {
    expect(db.lookupIpc('120B')?.bailable).toBeNull();
  });

  it('trims whitespace around the section number', () => {
    expect(db.lookup('IPC', '  498A  ')?.title).toBe('Cruelty by husband or relatives');
    expect(db.lookupBns('\t3(5)\n')?.title).toBe('Acts done in furtherance of common intention');
  });

  it('distinguishes the same number in different codes', () => {
    expect(db.lookupIpc('302')?.title).toBe('Murder');
    expect(db.lookupBns('302')?.title).toBe('Dishonestly receiving stolen property');
  });

  it('returns null for unknown numbers and empty codes', () => {
    expect(db.lookupIpc('9999')).toBeNull();
    expect(db.lookupBns('9999')).toBeNull();
    expect(db.lookup('IPC', '')).toBeNull();
    expect(db.lookup('CrPC', '156')).toBeNull();
  });

  it('matches section numbers case-sensitively', () => {
    expect(db.lookupIpc('498a')).toBeNull();
  });

  // ================================================================
  // MAPPING
  // ================================================================

  it('maps every bundled IPC section number back to its own mapping', () => {
    for (const mapping of tables.mappings) {
      const found = db.mapToNewCode(mapping.oldSection);
      expect(found?.oldSection).toBe(mapping.oldSection);
      expect(found).toEqual(mapping);
    }
  });

  it('maps IPC 302 to BNS 103 as replaced', () => {
    expect(db.mapIpcToBns('302')).toEqual({
      oldCode: 'IPC',
      oldSection: '302',
      newCode: 'BNS',
      newSection: '103',
      status: 'replaced',
    });
  });

  it('maps IPC 304A to BNS 106 as amended', () => {
    const mapping = db.mapIpcToBns(' 304A ');
    expect(mapping?.newSection).toBe('106');
    expect(mapping?.status).toBe('amended');
  });

  it('returns null when no mapping exists', () => {
    expect(db.mapIpcToBns('9999')).toBeNull();
    expect(db.mapIpcToBns('304a')).toBeNull();
    expect(db.mapToNewCode('302', 'CrPC')).toBeNull();
  });

  it('only uses the three mapping statuses', () => {
    for (const mapping of db.allMappings()) {
      expect(MAPPING_STATUSES).toContain(mapping.status);
    }
  });

  // ================================================================
  // LISTING & STATISTICS
  // ================================================================

  it('lists every section of a code family', () => {
    const ipc = db.allIpc();
    const bns = db.allBns();
    expect(ipc).toHaveLength(30);
    expect(bns).toHaveLength(28);
    expect(ipc.every((s) => s.code === 'IPC')).toBe(true);
    expect(bns.every((s) => s.code === 'BNS')).toBe(true);
    expect(db.allOfCodeFamily('POCSO')).toEqual([]);
  });

  it('reports counts per code and the mapping count', () => {
    const stats = db.getStatistics();
    expect(stats.sectionCounts).toEqual({ BNS: 28, IPC: 30 });
    expect(stats.mappingCount).toBe(27);
    expect(stats.loadedAt).not.toBe('Unknown');
  });

  it('builds from caller-supplied tables', () => {
    const small = new LegalCodeDatabase({
      sections: [
        {
          code: 'CrPC',
          sectionNumber: '156',
          title: 'Police power to investigate',
          description: 'Police officer may investigate a cognizable case.',
          punishment: null,
          bailable: null,
        },
      ],
      mappings: [],
    });
    expect(small.lookup('CrPC', '156')?.title).toBe('Police power to investigate');
    expect(small.allIpc()).toEqual([]);
    small.close();
  });

  describe('validation of caller-supplied tables', () => {
    const homicide: LegalSection = {
      code: 'IPC',
      sectionNumber: '302',
      title: 'Murder',
      description: 'Punishment for murder.',
      punishment: null,
      bailable: false,
    };

    it('rejects a duplicate (code, number) pair', () => {
      try {
        new LegalCodeDatabase({ sections: [homicide, { ...homicide }], mappings: [] });
        expect.unreachable('duplicate section should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(RecordValidationError);
        if (error instanceof RecordValidationError) {
          expect(error.issues).toEqual(['duplicate section IPC 302']);
        }
      }
    });

    it('treats numbers that differ only by whitespace as duplicates', () => {
      expect(
        () => new LegalCodeDatabase({ sections: [homicide, { ...homicide, sectionNumber: ' 302 ' }], mappings: [] })
      ).toThrow(RecordValidationError);
    });

    it('stores trimmed section numbers so they can be looked up', () => {
      const store = new LegalCodeDatabase({
        sections: [{ ...homicide, sectionNumber: ' 302 ' }],
        mappings: [
          { oldCode: 'IPC', oldSection: ' 302', newCode: 'BNS', newSection: '103 ', status: 'replaced' },
        ],
      });
      expect(store.lookup('IPC', '302')).toEqual(homicide);
      expect(store.mapIpcToBns('302')).toEqual({
        oldCode: 'IPC',
        oldSection: '302',
        newCode: 'BNS',
        newSection: '103',
        status: 'replaced',
      });
      store.close();
    });

    it('rejects a blank section number', () => {
      try {
        new LegalCodeDatabase({ sections: [{ ...homicide, sectionNumber: '  ' }], mappings: [] });
        expect.unreachable('blank section number should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(RecordValidationError);
        if (error instanceof RecordValidationError) {
          expect(error.issues).toEqual(['blank section number in IPC']);
        }
      }
    });
  });

  it('shares one store across callers', () => {
    expect(getSharedDatabase()).toBe(getSharedDatabase());
  });
});
