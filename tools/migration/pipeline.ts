/**
 * Migration Pipeline Orchestrator
 *
 * Turns a key-value export into one SQL file for an existing schema:
 * 1. Load schema -> 2. Catalogue export -> 3. Order tables -> 4. Transform -> 5. Emit
 *
 * Everything that can invalidate the whole plan (unreadable schema,
 * missing export, cyclic foreign keys) fails before a single row is
 * transformed, and the output file is only put in place once it has been
 * rendered completely. Problems with single files or records are skipped,
 * logged and counted in the summary.
 */
import fs from 'fs';
import path from 'path';
import { ulid } from 'ulid';
import { logger, serializeError } from '@reseed/core';
import { loadConfig, type MigrationConfig } from './config';
import { discoverSourceCatalog } from './catalog';
import { fieldOf } from './cleaner';
import type { IdMap } from './id-map';
import { planProcessing } from './resolver';
import { loadSchema } from './schema';
import { StatementEmitter } from './sql';
import { createTransformContext, transformRecord, type TransformOutcome } from './transformers';
import type {
  DocumentRef,
  JsonValue,
  MigrationSummary,
  ProcessingPlan,
  SchemaModel,
  Skip,
  SkipReason,
  SourceCatalog,
  TableReport,
} from './types';

export interface MigrationInput {
  schema: SchemaModel;
  catalog: SourceCatalog;
  plan: ProcessingPlan;
  /** table -> timestamp field for tables inserted in chronological order */
  chronologicalTables?: Record<string, string>;
}

export interface MigrationOutput {
  emitter: StatementEmitter;
  idMap: IdMap;
  tables: Record<string, TableReport>;
}

function emptyReport(): TableReport {
  return { discovered: 0, emitted: 0, skipped: 0, skippedByReason: {}, fallbacks: 0 };
}

function countSkip(report: TableReport, reason: SkipReason): void {
  report.skipped++;
  report.skippedByReason[reason] = (report.skippedByReason[reason] ?? 0) + 1;
}

type SortKey = { rank: 0 } | { rank: 1; value: number } | { rank: 2; value: string };

/** Missing values first, then numbers, then everything else as text */
function sortKey(value: JsonValue | undefined): SortKey {
  if (value === undefined || value === null) return { rank: 0 };
  if (typeof value === 'number') return { rank: 1, value };
  return { rank: 2, value: typeof value === 'string' ? value : JSON.stringify(value) };
}

function compareKeys(a: SortKey, b: SortKey): number {
  if (a.rank === 1 && b.rank === 1) return a.value - b.value;
  if (a.rank === 2 && b.rank === 2) return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  return a.rank - b.rank;
}

/** Stable sort by a timestamp field; documents without it come first, numbers before strings */
export function sortChronologically(docs: readonly DocumentRef[], field: string): DocumentRef[] {
  return docs
    .map((ref) => ({ ref, key: sortKey(fieldOf(ref.document, field)) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ ref }) => ref);
}

function logSkip(skip: Skip, filePath: string): void {
  logger.warn('Record skipped', {
    table: skip.table,
    reason: skip.reason,
    originalId: skip.originalId,
    referencedTable: skip.referencedTable,
    column: skip.column,
    detail: skip.detail,
    filePath,
  });
}

/**
 * Transform every record of every planned table, in plan order.
 *
 * Rows of self-referencing tables whose parent has no key yet are retried
 * once after the rest of the table; whatever is still unresolved then is
 * skipped as MissingParent.
 */
export function migrateTables(input: MigrationInput): MigrationOutput {
  const { schema, catalog, plan } = input;
  const chronological = input.chronologicalTables ?? {};
  const emitter = new StatementEmitter(schema);
  const tables: Record<string, TableReport> = {};
  const ctx = createTransformContext(schema, plan.order);
  const { idMap } = ctx;

  for (const name of plan.order) {
    const def = schema.tables.get(name);
    const group = catalog.groups.get(name);
    const report = emptyReport();
    tables[name] = report;
    if (!def || !group) continue;

    const sortField = chronological[name];
    emitter.beginTable(name, sortField ? `sorted by ${sortField}` : undefined);

    report.discovered = group.documents.length + group.invalidFiles.length;
    for (let i = 0; i < group.invalidFiles.length; i++) countSkip(report, 'InvalidDocumentFormat');

    const docs = sortField ? sortChronologically(group.documents, sortField) : group.documents;
    const allowDefer = plan.selfReferencing.has(name);

    const apply = (ref: DocumentRef, outcome: TransformOutcome): void => {
      if (outcome.kind === 'row') {
        emitter.addRow(name, outcome.row);
        report.emitted++;
        for (const fb of outcome.fallbacks) {
          report.fallbacks++;
          logger.warn('Value emitted as text', { ...fb, filePath: ref.filePath });
        }
      } else if (outcome.kind === 'skip') {
        countSkip(report, outcome.skip.reason);
        logSkip(outcome.skip, ref.filePath);
      }
    };

    const deferred: DocumentRef[] = [];
    for (const ref of docs) {
      const outcome = transformRecord(def, ref.document, ctx, { allowDefer });
      if (outcome.kind === 'defer') {
        deferred.push(ref);
        continue;
      }
      apply(ref, outcome);
    }

    if (deferred.length > 0) {
      logger.info('Retrying rows with unresolved self-references', { table: name, rows: deferred.length });
      for (const ref of deferred) {
        apply(ref, transformRecord(def, ref.document, ctx, { allowDefer: false }));
      }
    }

    logger.info('Table transformed', {
      table: name,
      discovered: report.discovered,
      emitted: report.emitted,
      skipped: report.skipped,
    });
  }

  return { emitter, idMap, tables };
}

/** Write `content` to `file` via a sibling temp file, so a failed run leaves no partial output */
export function writeArtifact(file: string, content: string, tag: string): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  const tmp = `${file}.${tag}.tmp`;
  try {
    fs.writeFileSync(tmp, content, 'utf-8');
    fs.renameSync(tmp, file);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

export class MigrationPipeline {
  private config: MigrationConfig;
  private summary: MigrationSummary;
  private output = '';

  constructor(config?: Partial<MigrationConfig>) {
    this.config = loadConfig(config);
    this.summary = {
      runId: ulid(),
      startedAt: new Date(),
      status: 'running',
      dryRun: this.config.dryRun,
      outputFile: null,
      order: [],
      tables: {},
      warnings: [],
    };
  }

  /** Rendered statements of the last successful run */
  get statements(): string {
    return this.output;
  }

  /** Run the full migration pipeline */
  run(): MigrationSummary {
    const { runId } = this.summary;
    logger.info('Migration started', {
      runId,
      schemaPath: this.config.schemaPath,
      exportDir: this.config.exportDir,
      mode: this.config.dryRun ? 'dry-run' : 'write',
    });

    try {
      const schema = loadSchema(this.config.schemaPath);
      const catalog = discoverSourceCatalog(this.config.exportDir, schema, this.config.tableNameOverrides);
      this.summary.warnings = catalog.warnings;

      const plan = planProcessing(schema, catalog.groups.keys());
      this.summary.order = plan.order;
      logger.info('Processing order resolved', {
        runId,
        order: plan.order,
        selfReferencing: [...plan.selfReferencing].sort(),
      });

      const result = migrateTables({
        schema,
        catalog,
        plan,
        chronologicalTables: this.config.chronologicalTables,
      });
      this.summary.tables = result.tables;
      this.output = result.emitter.render();

      if (!this.config.dryRun) {
        writeArtifact(this.config.outputFile, this.output, runId);
        this.summary.outputFile = this.config.outputFile;
        logger.info('SQL statements written', { runId, outputFile: this.config.outputFile });
      }

      this.summary.status = 'completed';
    } catch (error) {
      this.summary.status = 'failed';
      logger.error('Migration failed', { runId, error: serializeError(error) });
      throw error;
    } finally {
      this.summary.completedAt = new Date();
      if (this.config.summaryFile) {
        writeArtifact(this.config.summaryFile, JSON.stringify(this.summary, null, 2) + '\n', runId);
      }
    }

    return this.summary;
  }
}
