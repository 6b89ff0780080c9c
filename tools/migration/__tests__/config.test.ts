import { describe, it, expect } from 'vitest';
import { ValidationError } from '@reseed/shared';
import { isExcludedTable, loadConfig, parseFlags } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, {})).toEqual({
      schemaPath: 'database.sqlite',
      exportDir: 'export',
      outputFile: 'migrated_data.sql',
      tableNameOverrides: {},
      chronologicalTables: { event: 'created' },
      summaryFile: undefined,
      dryRun: false,
    });
  });

  it('reads the environment', () => {
    const config = loadConfig(
      {},
      {
        MIGRATION_SCHEMA_DB: 'dest.sqlite',
        MIGRATION_EXPORT_DIR: 'dump',
        MIGRATION_OUTPUT_FILE: 'out.sql',
        MIGRATION_TABLE_OVERRIDES: 'events=event, people=person',
        MIGRATION_CHRONOLOGICAL_TABLES: '{"audit_entry":"at"}',
        MIGRATION_SUMMARY_FILE: 'summary.json',
        MIGRATION_DRY_RUN: 'true',
      },
    );
    expect(config).toEqual({
      schemaPath: 'dest.sqlite',
      exportDir: 'dump',
      outputFile: 'out.sql',
      tableNameOverrides: { events: 'event', people: 'person' },
      chronologicalTables: { audit_entry: 'at' },
      summaryFile: 'summary.json',
      dryRun: true,
    });
  });

  it('prefers explicit overrides to the environment', () => {
    const config = loadConfig({ exportDir: 'cli-export', dryRun: false }, { MIGRATION_EXPORT_DIR: 'dump', MIGRATION_DRY_RUN: 'true' });
    expect(config.exportDir).toBe('cli-export');
    expect(config.dryRun).toBe(false);
  });

  it('rejects empty locations', () => {
    expect(() => loadConfig({ outputFile: '' }, {})).toThrow(ValidationError);
  });
});

describe('parseFlags', () => {
  it('ignores the command and reads known flags', () => {
    expect(
      parseFlags(['migrate', '--schema', 'db.sqlite', '--export-dir', 'dump', '--output', 'out.sql', '--summary', 's.json', '--dry-run']),
    ).toEqual({
      schemaPath: 'db.sqlite',
      exportDir: 'dump',
      outputFile: 'out.sql',
      summaryFile: 's.json',
      dryRun: true,
    });
  });

  it('merges repeated overrides', () => {
    expect(parseFlags(['migrate', '--override', 'events=event', '--override', 'people=person,tags=tag'])).toEqual({
      tableNameOverrides: { events: 'event', people: 'person', tags: 'tag' },
    });
  });

  it('rejects malformed overrides', () => {
    expect(() => parseFlags(['migrate', '--override', 'events='])).toThrow('Invalid name map entry "events="');
  });
});

describe('isExcludedTable', () => {
  it('excludes bookkeeping and internal tables', () => {
    expect(isExcludedTable('migrations')).toBe(true);
    expect(isExcludedTable('session')).toBe(true);
    expect(isExcludedTable('sqlite_sequence')).toBe(true);
    expect(isExcludedTable('sessions')).toBe(false);
  });
});
