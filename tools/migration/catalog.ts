/**
 * Source Catalog
 *
 * Groups export documents by destination table. Directory names are
 * resolved to table names as follows:
 *
 *   1. An override keyed by the directory name wins outright.
 *   2. `<a>__<b>_<digits>`: try `a_b`, then `a__b`, then `a`.
 *   3. Anything else is used verbatim; when that is not a known table and
 *      the name is `<a>_<digits>`, `a` is tried.
 *
 * The numeric suffix is an ordering artifact of the export and carries no
 * meaning here. Resolved names outside the schema are reported and left
 * out; bookkeeping tables are always left out.
 */
import { logger } from '@reseed/core';
import { isExcludedTable } from './config';
import { InvalidDocumentFormatError, UnknownTableError } from './errors';
import { discoverExportEntries, listDocumentFiles, readDocuments } from './loader';
import type { ExportEntry } from './loader';
import type { RecordGroup, SchemaModel, SourceCatalog } from './types';

const RELATION_DIR = /^([A-Za-z0-9]+(?:_[A-Za-z0-9]+)*?)__([A-Za-z0-9_]+?)_(\d+)$/;
const NUMBERED_DIR = /^([A-Za-z0-9]+(?:_[A-Za-z0-9]+)*?)_(\d+)$/;

export interface TableNameResolution {
  table: string;
  /** Whether the destination schema has the table */
  known: boolean;
  /** Names tried, in order */
  candidates: string[];
}

/** Candidate table names for one export directory name, most specific first */
export function tableNameCandidates(
  name: string,
  overrides: Record<string, string> = {},
): string[] {
  const override = overrides[name];
  if (override) return [override];

  const relation = RELATION_DIR.exec(name);
  if (relation) {
    const [, owner = '', child = ''] = relation;
    return [`${owner}_${child}`, `${owner}__${child}`, owner];
  }

  const numbered = NUMBERED_DIR.exec(name);
  if (numbered) {
    const [, base = ''] = numbered;
    return [name, base];
  }

  return [name];
}

export function resolveTableName(
  name: string,
  isKnown: (table: string) => boolean,
  overrides: Record<string, string> = {},
): TableNameResolution {
  const candidates = tableNameCandidates(name, overrides);
  const match = candidates.find(isKnown);
  if (match) return { table: match, known: true, candidates };
  return { table: candidates[0] ?? name, known: false, candidates };
}

function readEntry(entry: ExportEntry, group: RecordGroup): void {
  const files = entry.kind === 'directory' ? listDocumentFiles(entry.path) : [entry.path];
  for (const filePath of files) {
    try {
      group.documents.push(...readDocuments(filePath));
    } catch (err) {
      if (!(err instanceof InvalidDocumentFormatError)) throw err;
      group.invalidFiles.push({ filePath, reason: err.message });
      logger.warn('Skipping invalid document file', {
        table: group.table,
        filePath,
        error: { code: err.code, message: err.message },
      });
    }
  }
}

/**
 * Discover record groups under the export root.
 *
 * Entries are read in lexical order of their names, so directories that
 * resolve to the same table contribute documents in that order.
 */
export function discoverSourceCatalog(
  exportDir: string,
  schema: SchemaModel,
  overrides: Record<string, string> = {},
): SourceCatalog {
  const groups = new Map<string, RecordGroup>();
  const warnings: SourceCatalog['warnings'] = [];
  const isKnown = (table: string) => schema.tables.has(table);

  for (const entry of discoverExportEntries(exportDir)) {
    const { table, known } = resolveTableName(entry.stem, isKnown, overrides);

    if (isExcludedTable(table)) {
      logger.debug('Skipping bookkeeping table', { table, directory: entry.name });
      continue;
    }

    if (!known) {
      const err = new UnknownTableError(entry.name, table);
      warnings.push({ code: err.code, message: err.message, directory: entry.name, table });
      logger.warn('Export collection has no destination table', { table, directory: entry.name });
      continue;
    }

    let group = groups.get(table);
    if (!group) {
      group = { table, sources: [], documents: [], invalidFiles: [] };
      groups.set(table, group);
    }
    group.sources.push(entry.name);
    readEntry(entry, group);
  }

  for (const group of groups.values()) {
    for (const invalid of group.invalidFiles) {
      warnings.push({
        code: 'INVALID_DOCUMENT_FORMAT',
        message: invalid.reason,
        table: group.table,
        filePath: invalid.filePath,
      });
    }
    logger.info('Source collection discovered', {
      table: group.table,
      sources: group.sources,
      documents: group.documents.length,
      invalidFiles: group.invalidFiles.length,
    });
  }

  return { groups, warnings };
}
