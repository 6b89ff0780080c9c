#!/usr/bin/env tsx
/**
 * Migration CLI
 *
 * Usage:
 *   npx tsx tools/migration/run.ts migrate --schema ./database.sqlite --export-dir ./export
 *   npx tsx tools/migration/run.ts migrate --override events=event --dry-run
 *   npx tsx tools/migration/run.ts relationships --schema ./database.sqlite
 *   npx tsx tools/migration/run.ts plan --export-dir ./export
 */
import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });
dotenv.config();

import { logger, serializeError } from '@reseed/core';
import { discoverSourceCatalog } from './catalog';
import { loadConfig, parseFlags } from './config';
import { MigrationPipeline } from './pipeline';
import { formatPlan, formatRelationships, formatSummaryTable } from './report';
import { planProcessing } from './resolver';
import { listRelationships, loadSchema } from './schema';

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command) {
    printUsage();
    process.exit(1);
  }

  const config = loadConfig(parseFlags(args));

  switch (command) {
    case 'migrate': {
      const pipeline = new MigrationPipeline(config);
      const summary = pipeline.run();
      console.log('');
      for (const line of formatSummaryTable(summary)) console.log(line);
      console.log(
        summary.outputFile
          ? `\nSQL statements have been generated to ${summary.outputFile}`
          : '\nDry run: no output written',
      );
      break;
    }

    case 'relationships': {
      const schema = loadSchema(config.schemaPath);
      for (const line of formatRelationships(listRelationships(schema))) console.log(line);
      break;
    }

    case 'plan': {
      const schema = loadSchema(config.schemaPath);
      const catalog = discoverSourceCatalog(config.exportDir, schema, config.tableNameOverrides);
      for (const line of formatPlan(planProcessing(schema, catalog.groups.keys()))) console.log(line);
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

function printUsage() {
  console.log(`
Key-value export -> SQLite migration

Commands:
  migrate         Generate the SQL file for the export
  relationships   List the foreign keys of the destination schema
  plan            Show the table processing order

Flags:
  --schema <file>         Destination SQLite database (default: database.sqlite)
  --export-dir <dir>      Export root, one directory per collection (default: export)
  --output <file>         SQL output file (default: migrated_data.sql)
  --override <dir=table>  Map an export directory to a table (repeatable)
  --summary <file>        Also write the run summary as JSON
  --dry-run               Transform everything but write no SQL file

Examples:
  npx tsx tools/migration/run.ts migrate --schema ./database.sqlite --export-dir ./export
  npx tsx tools/migration/run.ts migrate --override events=event --summary ./summary.json
  npx tsx tools/migration/run.ts relationships
`);
}

main().catch((err) => {
  logger.error('Fatal error', { error: serializeError(err) });
  process.exit(1);
});
