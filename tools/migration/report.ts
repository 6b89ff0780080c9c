/**
 * Plain-text renderings of a run for the CLI.
 */
import type { RelationshipLine } from './schema';
import type { MigrationSummary, ProcessingPlan, TableReport } from './types';

function reasons(report: TableReport): string {
  const parts = Object.entries(report.skippedByReason)
    .filter(([, n]) => (n ?? 0) > 0)
    .map(([reason, n]) => `${reason}: ${n}`);
  return parts.length > 0 ? `  (${parts.join(', ')})` : '';
}

export function formatSummaryTable(summary: MigrationSummary): string[] {
  const names = summary.order.length > 0 ? summary.order : Object.keys(summary.tables);
  const width = Math.max('Table'.length, ...names.map((n) => n.length));
  const lines = [
    `${'Table'.padEnd(width)}  ${'discovered'.padStart(10)}  ${'emitted'.padStart(8)}  ${'skipped'.padStart(8)}`,
  ];

  for (const name of names) {
    const r = summary.tables[name];
    if (!r) continue;
    lines.push(
      `${name.padEnd(width)}  ${String(r.discovered).padStart(10)}  ${String(r.emitted).padStart(8)}  ${String(r.skipped).padStart(8)}${reasons(r)}`,
    );
  }

  const fallbacks = Object.values(summary.tables).reduce((n, r) => n + r.fallbacks, 0);
  if (fallbacks > 0) lines.push(`${fallbacks} value(s) emitted as text because they did not fit their column type`);
  if (summary.warnings.length > 0) lines.push(`${summary.warnings.length} warning(s) while reading the export`);
  return lines;
}

export function formatRelationships(relationships: RelationshipLine[]): string[] {
  if (relationships.length === 0) return ['No foreign key relationships found.'];
  const lines: string[] = [];
  let current = '';
  for (const rel of relationships) {
    if (rel.table !== current) {
      current = rel.table;
      lines.push(`Table: ${rel.table}`);
    }
    lines.push(`  - ${rel.column} references ${rel.referencedTable}.${rel.referencedColumn ?? '?'}`);
  }
  return lines;
}

export function formatPlan(plan: ProcessingPlan): string[] {
  const lines = plan.order.map((table, i) => {
    const self = plan.selfReferencing.has(table) ? '  (self-referencing)' : '';
    return `${String(i + 1).padStart(3)}. ${table}${self}`;
  });
  return lines.length > 0 ? lines : ['Nothing to migrate.'];
}
