import * as Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { DataLoadError, errorMessage } from './errors';
import { describe, formatDescribe } from './statistics';
import type { CellValue, ColumnType, DataSource, Dataset, DatasetStats } from './types';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Spellings read as a missing value, as spreadsheet exports tend to write them.
const MISSING_VALUES = new Set(['', 'NA', 'N/A', 'n/a', '#N/A', 'NaN', 'nan', 'NULL', 'null', 'None', '<NA>']);

interface TableSource {
  originalName: string;
  source: DataSource;
  sheetName?: string;
  // Reject rows wider than the header instead of widening the header.
  strictWidth?: boolean;
  // File line of each body row, for error messages.
  lineNumbers?: number[];
}

export class DataProcessor {
  static generateId(): string {
    return Date.now().toString(36) + Math.random().toString(36).slice(2);
  }

  static processCsvBuffer(buffer: Buffer, originalName: string): Dataset {
    const text = buffer.toString('utf8').replace(/^\uFEFF/, '');

    const result = Papa.parse<string[]>(text, {
      header: false,
      delimiter: ',',
      skipEmptyLines: false,
    });

    if (result.errors.length > 0) {
      const details = result.errors
        .map(e => (e.row !== undefined ? `row ${e.row + 1}: ${e.message}` : e.message))
        .join(', ');
      throw new DataLoadError('Error loading CSV file', details);
    }

    // Blank lines are dropped here rather than by the parser so rows keep their file line.
    const rows: string[][] = [];
    const lineNumbers: number[] = [];
    let line = 1;
    for (const row of result.data) {
      if (!(row.length === 1 && row[0] === '')) {
        rows.push(row);
        lineNumbers.push(line);
      }
      line += 1 + row.reduce((count, field) => count + (field.match(/\n/g)?.length ?? 0), 0);
    }

    return this.processRows(rows, {
      originalName,
      source: 'csv',
      strictWidth: true,
      lineNumbers: lineNumbers.slice(1),
    });
  }

  static processExcelBuffer(buffer: Buffer, originalName: string): Dataset {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true, cellNF: false, cellText: false });
    } catch (error) {
      throw new DataLoadError('Error loading Excel file', errorMessage(error));
    }

    for (const sheetName of workbook.SheetNames) {
      const worksheet = workbook.Sheets[sheetName];
      if (!worksheet) continue;

      const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
        header: 1,
        defval: null,
        raw: false,
        blankrows: false,
      });
      if (rows.length === 0) continue;

      return this.processRows(rows, { originalName, source: 'excel', sheetName });
    }

    throw new DataLoadError('The data is empty.');
  }

  /**
   * Turns raw rows (first row = header) into a typed dataset. Shared by the
   * CSV, Excel and Google Sheets loaders.
   */
  static processRows(rows: unknown[][], source: TableSource): Dataset {
    if (rows.length === 0) {
      throw new DataLoadError('The data is empty.');
    }

    const [headerRow, ...body] = rows;
    const cells = body.map(row => row.map(toCell));
    let width = headerRow.length;

    if (source.strictWidth) {
      cells.forEach((row, index) => {
        if (row.length > width) {
          throw new DataLoadError(
            'Error loading CSV file',
            `Error tokenizing data. Expected ${width} fields in line ${source.lineNumbers?.[index] ?? index + 2}, saw ${row.length}`
          );
        }
      });
    } else {
      width = cells.reduce((max, row) => Math.max(max, lastFilledIndex(row) + 1), width);
    }

    const headers = this.normalizeHeaders(
      Array.from({ length: width }, (_, i) => toHeader(headerRow[i]))
    );

    const padded = cells.map(row =>
      Array.from({ length: width }, (_, i): CellValue => (i < row.length ? row[i] : null))
    );

    if (padded.length === 0 || width === 0) {
      throw new DataLoadError('The data is empty.');
    }

    const columnTypes = headers.map((_, col) => inferColumnType(padded.map(row => row[col])));
    const data = padded.map(row =>
      row.map((value, col) => coerceCell(value, columnTypes[col]))
    );

    return {
      originalName: source.originalName,
      source: source.source,
      sheetName: source.sheetName,
      headers,
      columnTypes,
      data,
      rowCount: data.length,
      columnCount: headers.length,
      createdAt: new Date(),
    };
  }

  /** Blank headers become `Unnamed: <i>`; repeats get `.1`, `.2`, ... */
  static normalizeHeaders(headers: string[]): string[] {
    const seen = new Map<string, number>();
    const taken = new Set<string>();

    return headers.map((raw, index) => {
      const base = raw.trim() === '' ? `Unnamed: ${index}` : raw;
      let name = base;
      let counter = seen.get(base) ?? 0;
      while (taken.has(name)) {
        counter += 1;
        name = `${base}.${counter}`;
      }
      seen.set(base, counter);
      taken.add(name);
      return name;
    });
  }

  static computeStats(dataset: Dataset): DatasetStats {
    return {
      columns: [...dataset.headers],
      rows: dataset.rowCount,
      summary: formatDescribe(describe(dataset)),
    };
  }

  static numericColumns(dataset: Dataset): string[] {
    return dataset.headers.filter((_, i) => dataset.columnTypes[i] !== 'string');
  }

  static preview(dataset: Dataset, count = 5): Array<Record<string, CellValue>> {
    return dataset.data.slice(0, count).map(row => {
      const record: Record<string, CellValue> = {};
      dataset.headers.forEach((header, i) => {
        record[header] = row[i];
      });
      return record;
    });
  }

  static optimizeDataForLLM(dataset: Dataset): string {
    return `Analyzing a dataset with ${dataset.rowCount} rows and columns: ${dataset.headers.join(', ')}.`;
  }
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return value.toISOString();
  const text = String(value);
  return MISSING_VALUES.has(text.trim()) ? null : text;
}

function toHeader(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

function lastFilledIndex(row: CellValue[]): number {
  for (let i = row.length - 1; i >= 0; i--) {
    if (row[i] !== null) return i;
  }
  return -1;
}

export function inferColumnType(values: CellValue[]): ColumnType {
  let sawValue = false;
  let allIntegers = true;

  for (const value of values) {
    if (value === null) continue;
    sawValue = true;
    if (typeof value === 'number') {
      if (Number.isInteger(value) && !Number.isSafeInteger(value)) return 'string';
      if (!Number.isInteger(value)) allIntegers = false;
      continue;
    }
    const text = value.trim();
    // Integers past 2^53 and numerals that overflow to Infinity stay text.
    if (INTEGER_PATTERN.test(text)) {
      if (!Number.isSafeInteger(Number(text))) return 'string';
      continue;
    }
    if (FLOAT_PATTERN.test(text) && Number.isFinite(Number(text))) {
      allIntegers = false;
      continue;
    }
    return 'string';
  }

  if (!sawValue) return 'string';
  return allIntegers ? 'integer' : 'float';
}

function coerceCell(value: CellValue, type: ColumnType): CellValue {
  if (value === null || type === 'string') {
    return typeof value === 'number' ? String(value) : value;
  }
  return typeof value === 'number' ? value : Number(value.trim());
}
