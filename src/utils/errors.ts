export class DashboardError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(code: string, message: string, status: number = 400, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class UnsupportedFileTypeError extends DashboardError {
  constructor(fileName: string) {
    super(
      'UNSUPPORTED_FILE_TYPE',
      `Unsupported file "${fileName}". Please upload an Excel (.xlsx, .xls) or delimited text (.csv, .tsv, .txt) file`,
      415
    );
  }
}

export class LoadFailureError extends DashboardError {
  constructor(fileName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('LOAD_FAILURE', `Error loading file "${fileName}": ${reason}`, 422);
  }
}

export type PreparationErrorKind = 'MissingDateColumn';

export interface PreparationDebugInfo {
  columnTypes: Record<string, string>;
  sampleRows: Record<string, unknown>[];
}

/**
 * Structural problem found while enriching a loaded table. Fatal for the upload.
 */
export class PreparationError extends DashboardError {
  readonly kind: PreparationErrorKind;

  constructor(kind: PreparationErrorKind, message: string, debug: PreparationDebugInfo) {
    super('PREPARATION_ERROR', message, 422, { kind, ...debug });
    this.kind = kind;
  }
}

export class NoDatasetError extends DashboardError {
  constructor() {
    super('NO_DATASET', 'No data available. Please upload a sales data file first', 404);
  }
}

export function isDashboardError(error: unknown): error is DashboardError {
  return error instanceof DashboardError;
}
