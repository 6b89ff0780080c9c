/**
 * Migration Configuration
 *
 * Locations of the destination schema, the source export and the output
 * artifact, plus the naming rules applied while cataloguing the export.
 * Override via environment variables or CLI args.
 */
import { z } from 'zod';
import { assertValidated, nameMapSchema, parseNameMap } from '@reseed/shared';

export interface MigrationConfig {
  /** SQLite database whose schema is the migration target (opened read-only) */
  schemaPath: string;
  /** Root of the key-value export: one directory per source collection */
  exportDir: string;
  /** File the generated SQL statements are written to */
  outputFile: string;
  /** Export directory name -> destination table name */
  tableNameOverrides: Record<string, string>;
  /** Append-only tables whose rows are inserted ordered by a timestamp field */
  chronologicalTables: Record<string, string>;
  /** Optional path for a JSON copy of the run summary */
  summaryFile?: string;
  /** Plan and transform everything but write no output */
  dryRun: boolean;
}

/** Tables that hold destination bookkeeping and are never populated from source data */
export const EXCLUDED_TABLES = new Set(['migrations', 'session']);

/** SQLite reserves every table name with this prefix */
export const INTERNAL_TABLE_PREFIX = 'sqlite_';

export const DEFAULT_CHRONOLOGICAL_TABLES: Record<string, string> = { event: 'created' };

const configSchema = z.object({
  schemaPath: z.string().min(1),
  exportDir: z.string().min(1),
  outputFile: z.string().min(1),
  tableNameOverrides: nameMapSchema,
  chronologicalTables: nameMapSchema,
  summaryFile: z.string().min(1).optional(),
  dryRun: z.boolean(),
});

export function isExcludedTable(table: string): boolean {
  return EXCLUDED_TABLES.has(table) || table.startsWith(INTERNAL_TABLE_PREFIX);
}

export function loadConfig(
  overrides: Partial<MigrationConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): MigrationConfig {
  const raw = {
    schemaPath: overrides.schemaPath ?? env.MIGRATION_SCHEMA_DB ?? 'database.sqlite',
    exportDir: overrides.exportDir ?? env.MIGRATION_EXPORT_DIR ?? 'export',
    outputFile: overrides.outputFile ?? env.MIGRATION_OUTPUT_FILE ?? 'migrated_data.sql',
    tableNameOverrides:
      overrides.tableNameOverrides ?? parseNameMap(env.MIGRATION_TABLE_OVERRIDES) ?? {},
    chronologicalTables:
      overrides.chronologicalTables ??
      parseNameMap(env.MIGRATION_CHRONOLOGICAL_TABLES) ??
      DEFAULT_CHRONOLOGICAL_TABLES,
    summaryFile: overrides.summaryFile ?? (env.MIGRATION_SUMMARY_FILE || undefined),
    dryRun: overrides.dryRun ?? env.MIGRATION_DRY_RUN === 'true',
  };

  const parsed = configSchema.safeParse(raw);
  assertValidated(parsed, 'Invalid migration config');
  return parsed.data;
}

/** Config overrides from CLI arguments; `args[0]` is the command */
export function parseFlags(args: string[]): Partial<MigrationConfig> {
  const flags: Partial<MigrationConfig> = {};
  const overrides: Record<string, string> = {};
  let hasOverrides = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === '--dry-run') flags.dryRun = true;
    else if (arg === '--schema' && next) { flags.schemaPath = next; i++; }
    else if (arg === '--export-dir' && next) { flags.exportDir = next; i++; }
    else if (arg === '--output' && next) { flags.outputFile = next; i++; }
    else if (arg === '--summary' && next) { flags.summaryFile = next; i++; }
    else if (arg === '--override' && next) {
      Object.assign(overrides, parseNameMap(next));
      hasOverrides = true;
      i++;
    }
  }

  if (hasOverrides) flags.tableNameOverrides = overrides;
  return flags;
}
