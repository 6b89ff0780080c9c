import { AppError } from '@reseed/shared';

/** Destination database missing or its catalog unreadable. Fatal. */
export class SchemaUnavailableError extends AppError {
  constructor(
    public readonly location: string,
    cause?: unknown,
  ) {
    super(
      'SCHEMA_UNAVAILABLE',
      `Destination schema unavailable at ${location}${cause instanceof Error ? `: ${cause.message}` : ''}`,
    );
    this.name = 'SchemaUnavailableError';
  }
}

/** Export root missing or not a directory. Fatal. */
export class ExportUnavailableError extends AppError {
  constructor(public readonly location: string) {
    super('EXPORT_UNAVAILABLE', `Export directory does not exist: ${location}`);
    this.name = 'ExportUnavailableError';
  }
}

/** Foreign keys form a cycle across two or more tables. Fatal. */
export class CyclicDependencyError extends AppError {
  constructor(public readonly tables: string[]) {
    super('CYCLIC_DEPENDENCY', `Cyclic foreign key dependency between tables: ${tables.join(', ')}`);
    this.name = 'CyclicDependencyError';
  }
}

/** One export file could not be parsed into documents. Recovered. */
export class InvalidDocumentFormatError extends AppError {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super('INVALID_DOCUMENT_FORMAT', `Invalid document format in ${filePath}: ${reason}`);
    this.name = 'InvalidDocumentFormatError';
  }
}

/** A source group resolved to a table the destination does not have. Recovered. */
export class UnknownTableError extends AppError {
  constructor(
    public readonly directory: string,
    public readonly table: string,
  ) {
    super('UNKNOWN_TABLE', `Table "${table}" (from ${directory}) is not in the destination schema`);
    this.name = 'UnknownTableError';
  }
}
