import path from 'path';
import { Readable } from 'stream';
import csv from 'csv-parser';
import * as XLSX from 'xlsx';
import { CellValue, FileKind, LoadedTable, RawRow, RawTable } from '@/types/data';
import { LoadFailureError, UnsupportedFileTypeError, isDashboardError } from '@/utils/errors';
import { config } from '@/utils/config';
import { logger } from '@/utils/logger';

const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls'];
const DELIMITED_EXTENSIONS = ['.csv', '.tsv', '.txt'];

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function detectFileKind(fileName: string): FileKind | null {
  const ext = path.extname(fileName).toLowerCase();
  if (SPREADSHEET_EXTENSIONS.includes(ext)) return 'spreadsheet';
  if (DELIMITED_EXTENSIONS.includes(ext)) return 'delimited';
  return null;
}

/**
 * Header names as the dashboard sees them: trimmed, blank ones named after their
 * position, repeats suffixed `.1`, `.2`, ...
 */
export function createHeaderNamer(): (raw: unknown, index: number) => string {
  const seen = new Map<string, number>();
  return (raw, index) => {
    const text = raw === null || raw === undefined ? '' : String(raw).replace(/^\uFEFF/, '').trim();
    const base = text || `Unnamed: ${index}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  };
}

export function normalizeHeaders(headers: unknown[]): string[] {
  const nameHeader = createHeaderNamer();
  return headers.map((raw, index) => nameHeader(raw, index));
}

function sniffSeparator(fileName: string, buffer: Buffer): string {
  const ext = path.extname(fileName).toLowerCase();
  if (ext === '.tsv') return '\t';
  if (ext === '.csv') return ',';

  const firstLine = buffer.toString('utf8', 0, Math.min(buffer.length, 4096)).split(/\r?\n/)[0] ?? '';
  const counts: [string, number][] = ['\t', ';', ','].map(sep => [sep, firstLine.split(sep).length - 1]);
  const [best] = counts.sort((a, b) => b[1] - a[1]);
  return best[1] > 0 ? best[0] : ',';
}

/**
 * Columns whose non-empty cells are all numeric become numbers, blanks become null.
 */
export function inferColumnTypes(columns: string[], rows: Record<string, string | undefined>[]): RawRow[] {
  const numericColumns = new Set(
    columns.filter(column => {
      const filled = rows.map(row => row[column]?.trim() ?? '').filter(Boolean);
      return filled.length > 0 && filled.every(value => NUMERIC_PATTERN.test(value));
    })
  );

  return rows.map(row => {
    const typed: RawRow = {};
    for (const column of columns) {
      const value = row[column];
      if (value === undefined || value.trim() === '') {
        typed[column] = null;
      } else {
        typed[column] = numericColumns.has(column) ? Number(value.trim()) : value;
      }
    }
    return typed;
  });
}

export async function parseDelimited(fileName: string, buffer: Buffer): Promise<RawTable> {
  const separator = sniffSeparator(fileName, buffer);
  const nameHeader = createHeaderNamer();
  let columns: string[] = [];
  const rows: Record<string, string | undefined>[] = [];

  await new Promise<void>((resolve, reject) => {
    Readable.from(buffer)
      .pipe(csv({
        separator,
        mapHeaders: ({ header, index }) => nameHeader(header, index)
      }))
      .on('headers', (headers: string[]) => {
        columns = headers;
      })
      .on('data', (row: Record<string, string>) => {
        rows.push(row);
      })
      .on('end', () => resolve())
      .on('error', (error: Error) => reject(error));
  });

  return { columns, rows: inferColumnTypes(columns, rows) };
}

function toCellValue(value: unknown): CellValue {
  if (value === undefined || value === null || value === '') return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  return String(value);
}

interface DateCode {
  y: number;
  m: number;
  d: number;
  H: number;
  M: number;
  S: number;
}

/**
 * Date serial to the wall-clock moment it encodes, carried in a UTC Date so the
 * server timezone never shifts the day or the hour. Time-only serials land on
 * 1899-12-31.
 */
export function serialToDate(serial: number, date1904: boolean = false): Date | null {
  const code: DateCode | null = XLSX.SSF.parse_date_code(serial, { date1904 });
  if (!code) return null;
  return new Date(Date.UTC(code.y, code.m - 1, code.d, code.H, code.M, code.S));
}

function readCell(cell: XLSX.CellObject | undefined, date1904: boolean): CellValue {
  if (!cell || cell.t === 'z' || cell.t === 'e') return null;
  if (cell.t === 'n' && typeof cell.v === 'number' && typeof cell.z === 'string' && XLSX.SSF.is_date(cell.z)) {
    return serialToDate(cell.v, date1904);
  }
  return toCellValue(cell.v);
}

function readGrid(sheet: XLSX.WorkSheet, date1904: boolean): CellValue[][] {
  const ref = sheet['!ref'];
  if (!ref) return [];

  const range = XLSX.utils.decode_range(ref);
  const grid: CellValue[][] = [];
  for (let r = range.s.r; r <= range.e.r; r++) {
    const cells: CellValue[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
      cells.push(readCell(cell, date1904));
    }
    if (cells.some(value => value !== null)) grid.push(cells);
  }
  return grid;
}

export function parseSpreadsheet(buffer: Buffer, preferredSheet: string = config.preferredSheet): {
  table: RawTable;
  sheetNames: string[];
  sheetUsed: string;
} {
  // Date cells stay serials with their number format; readCell converts them.
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: false, cellNF: true });
  const sheetNames = workbook.SheetNames;
  if (sheetNames.length === 0) {
    throw new Error('Workbook contains no sheets');
  }
  logger.info(`Available sheets: ${sheetNames.join(', ')}`);

  const sheetUsed = sheetNames.includes(preferredSheet) ? preferredSheet : sheetNames[0];
  const date1904 = Boolean(workbook.Workbook?.WBProps?.date1904);
  const [headerRow = [], ...body] = readGrid(workbook.Sheets[sheetUsed], date1904);

  const columns = normalizeHeaders(headerRow);
  const rows = body.map(cells => {
    const row: RawRow = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? null;
    });
    return row;
  });

  return { table: { columns, rows }, sheetNames, sheetUsed };
}

/**
 * Turns uploaded bytes into a RawTable. Unknown extensions are rejected before
 * parsing; any parser failure is reported as a load failure with its message.
 */
export async function loadTable(fileName: string, buffer: Buffer): Promise<LoadedTable> {
  const kind = detectFileKind(fileName);
  if (!kind) {
    throw new UnsupportedFileTypeError(fileName);
  }

  try {
    let loaded: LoadedTable;
    if (kind === 'spreadsheet') {
      const { table, sheetNames, sheetUsed } = parseSpreadsheet(buffer);
      loaded = { table, fileName, kind, sheetNames, sheetUsed };
    } else {
      const table = await parseDelimited(fileName, buffer);
      loaded = { table, fileName, kind, sheetNames: [] };
    }

    if (loaded.table.columns.length === 0) {
      throw new Error('No columns to parse from file');
    }
    if (loaded.table.rows.length === 0) {
      throw new Error('File contains a header but no data rows');
    }

    logger.info(`Loaded ${fileName}`, {
      rows: loaded.table.rows.length,
      columns: loaded.table.columns
    });
    return loaded;
  } catch (error) {
    if (isDashboardError(error)) throw error;
    logger.error(`Error loading file ${fileName}:`, error);
    throw new LoadFailureError(fileName, error);
  }
}

export function describeCellType(value: CellValue): string {
  if (value === null) return 'empty';
  if (value instanceof Date) return 'date';
  return typeof value;
}

/**
 * Per-column type summary for diagnostics: the single type of its non-empty
 * cells, `mixed`, or `empty`.
 */
export function describeColumnTypes(table: RawTable): Record<string, string> {
  const types: Record<string, string> = {};
  for (const column of table.columns) {
    const kinds = new Set(
      table.rows.map(row => describeCellType(row[column] ?? null)).filter(kind => kind !== 'empty')
    );
    types[column] = kinds.size === 0 ? 'empty' : kinds.size === 1 ? [...kinds][0] : 'mixed';
  }
  return types;
}
