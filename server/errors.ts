// =============================================================================
// Run-level failures
//
// Only whole-table or configuration problems are thrown. Anything local to one
// row or one group (a bad CSV line, a leg without a flight record, a zero
// denominator) is reported as a count or a null and the run carries on.
// =============================================================================

export type PipelineErrorCode =
  | 'CONFIGURATION_MISSING'
  | 'TABLE_MISSING'
  | 'SCHEMA_MISMATCH';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: PipelineErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigurationMissingError extends PipelineError {
  constructor(missing: string[], source: string) {
    super(
      'CONFIGURATION_MISSING',
      `KPI configuration incomplete (${source}): missing or invalid ${missing.join(', ')}`,
      { missing, source },
    );
  }
}

export class TableMissingError extends PipelineError {
  constructor(table: string, path: string) {
    super('TABLE_MISSING', `${table} table not found at ${path}`, { table, path });
  }
}

export class SchemaMismatchError extends PipelineError {
  constructor(table: string, missingColumns: string[]) {
    super(
      'SCHEMA_MISMATCH',
      `${table} table is missing required columns: ${missingColumns.join(', ')}`,
      { table, missingColumns },
    );
  }
}
