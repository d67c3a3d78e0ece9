import Database from 'better-sqlite3';
import { createLogger } from '../logger.js';
import type { StatuteTables } from '../types.js';

const log = createLogger('database');

/**
 * Builds the in-memory statute database from validated tables. The handle is
 * switched to query_only once seeded, so nothing can write to it afterwards.
 */
export function initializeDatabase(tables: StatuteTables): Database.Database {
  const db = new Database(':memory:');

  db.pragma('foreign_keys = ON');

  // Sections of every code family share one table, keyed by (code, number)
  db.exec(`
    CREATE TABLE IF NOT EXISTS sections (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      code TEXT NOT NULL,
      section_number TEXT NOT NULL,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      punishment TEXT,
      bailable INTEGER CHECK (bailable IN (0, 1)),
      UNIQUE(code, section_number)
    );

    CREATE INDEX IF NOT EXISTS idx_sections_code ON sections(code);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS mappings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      old_code TEXT NOT NULL,
      old_section TEXT NOT NULL,
      new_code TEXT NOT NULL,
      new_section TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('replaced', 'amended', 'repealed')),
      UNIQUE(old_code, old_section)
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);

  const insertSection = db.prepare<[string, string, string, string, string | null, number | null]>(`
    INSERT INTO sections (code, section_number, title, description, punishment, bailable)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const insertMapping = db.prepare<[string, string, string, string, string]>(`
    INSERT INTO mappings (old_code, old_section, new_code, new_section, status)
    VALUES (?, ?, ?, ?, ?)
  `);
  const setMetadata = db.prepare<[string, string]>('INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)');

  const seed = db.transaction((data: StatuteTables) => {
    for (const section of data.sections) {
      insertSection.run(
        section.code,
        section.sectionNumber,
        section.title,
        section.description,
        section.punishment,
        section.bailable === null ? null : section.bailable ? 1 : 0
      );
    }
    for (const mapping of data.mappings) {
      insertMapping.run(mapping.oldCode, mapping.oldSection, mapping.newCode, mapping.newSection, mapping.status);
    }
    setMetadata.run('loaded_at', new Date().toISOString());
  });
  seed(tables);

  db.pragma('query_only = ON');

  log.debug(
    { sections: tables.sections.length, mappings: tables.mappings.length },
    'statute database initialized'
  );
  return db;
}
