import { promises as fs } from 'fs';
import * as path from 'path';

import * as Papa from 'papaparse';
import * as XLSX from 'xlsx';

import { InputNotFoundError, InviteSyncError } from './errors';
import { getLogger } from './logger';
import type { Table, TableRecord } from './types';

const log = getLogger('reconcile:table');

const WORKBOOK_EXTENSIONS = ['.xlsx', '.xls'];

function isMissingFile(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

async function readInput(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (isMissingFile(error)) {
      throw new InputNotFoundError(`Input file not found: ${filePath}`, filePath);
    }
    throw error;
  }
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  return String(cell);
}

/** Makes repeated headers unique by suffixing `.1`, `.2`, ... to the later occurrences. */
export function dedupeHeaders(headers: readonly string[]): string[] {
  const taken = new Set(headers);
  const seen = new Set<string>();
  return headers.map((header) => {
    if (!seen.has(header)) {
      seen.add(header);
      return header;
    }
    let n = 1;
    while (taken.has(`${header}.${n}`)) n += 1;
    const unique = `${header}.${n}`;
    taken.add(unique);
    return unique;
  });
}

/**
 * First row is the header; later rows become records keyed by header. Repeated headers are
 * renamed by `dedupeHeaders` so no column is lost.
 */
export function tableFromMatrix(matrix: readonly (readonly unknown[])[]): Table {
  if (matrix.length === 0) {
    return { columns: [], rows: [] };
  }

  const columns = dedupeHeaders(matrix[0].map(cellText));
  if (columns.some((column, idx) => column !== cellText(matrix[0][idx]))) {
    log.warn('Renamed repeated column headers', { columns });
  }
  const rows = matrix.slice(1).map((cells) => {
    const record: TableRecord = {};
    columns.forEach((column, idx) => {
      record[column] = cellText(cells[idx]);
    });
    return record;
  });

  return { columns, rows };
}

function parseWorkbook(buffer: Buffer, filePath: string): Table {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new InviteSyncError(`Workbook has no sheets: ${filePath}`);
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: false,
    blankrows: false,
  });
  log.debug('Parsed workbook sheet', { filePath, sheetName, rows: matrix.length });
  return tableFromMatrix(matrix);
}

export function parseCsv(text: string): Table {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });
  if (result.errors.length > 0) {
    log.warn('CSV parse reported problems', {
      errors: result.errors.map((err) => ({ row: err.row, message: err.message })),
    });
  }
  return tableFromMatrix(result.data);
}

/** Reads a registration table from an .xlsx/.xls workbook (first sheet) or a .csv file. */
export async function readTable(filePath: string): Promise<Table> {
  const buffer = await readInput(filePath);
  const ext = path.extname(filePath).toLowerCase();
  if (WORKBOOK_EXTENSIONS.includes(ext)) {
    return parseWorkbook(buffer, filePath);
  }
  return parseCsv(buffer.toString('utf8'));
}

export function toCsv(columns: readonly string[], rows: readonly TableRecord[]): string {
  return Papa.unparse(
    {
      fields: [...columns],
      data: rows.map((row) => columns.map((column) => row[column] ?? '')),
    },
    { newline: '\n' }
  );
}

/** Writes the rows as CSV, replacing any existing file and creating the parent directory. */
export async function writeCsv(filePath: string, columns: readonly string[], rows: readonly TableRecord[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${toCsv(columns, rows)}\n`, 'utf8');
  log.info('Wrote CSV', { filePath, rows: rows.length });
}

/** The first .xlsx file in `dir`, by name. */
export async function findInputWorkbook(dir: string): Promise<string> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isMissingFile(error)) {
      throw new InputNotFoundError(`Input directory not found: ${dir}`, dir);
    }
    throw error;
  }

  const workbooks = entries.filter((entry) => entry.toLowerCase().endsWith('.xlsx')).sort();
  if (workbooks.length === 0) {
    throw new InputNotFoundError(`No Excel files found in ${dir}`, dir);
  }
  return path.join(dir, workbooks[0]);
}
