import * as XLSX from 'xlsx';

import { CellValue } from '../models/tabular-source';
import { convertTextCell, inferTextColumnType, inferValueColumnType } from '../utils/column-types';
import { parseDelimitedText } from '../utils/delimited';
import { toDisplayText } from '../utils/display';
import { SourceUnavailableError } from './errors';
import { buildSchema, MaterializedTable } from './materialized-table-engine';

// Only read sheet names, not data
const SHEET_NAMES_ONLY_OPTIONS = {
  bookSheets: true,
  bookProps: false,
  bookVBA: false,
  cellFormula: false,
  cellHTML: false,
  cellNF: false,
  cellStyles: false,
  cellText: false,
  sheetStubs: false,
} satisfies XLSX.ParsingOptions;

const SHEET_DATA_OPTIONS = {
  cellDates: true,
  cellFormula: false,
  cellHTML: false,
  cellStyles: false,
} satisfies XLSX.ParsingOptions;

export interface DelimitedTable extends MaterializedTable {
  delimiter: string;
}

/**
 * CSV/TSV text with a header record. A column is numeric, boolean or
 * temporal only if every non-empty value parses as such. An empty text has
 * no columns and no rows.
 */
export function loadDelimitedTable(text: string, delimiter?: string): DelimitedTable {
  const parsed = parseDelimitedText(text, delimiter);

  const types = parsed.header.map((_, columnIndex) =>
    inferTextColumnType(parsed.rows.map((row) => row[columnIndex])),
  );
  const schema = buildSchema(
    parsed.header,
    types.map((type) => ({ declaredType: type, type })),
  );
  const rows = parsed.rows.map((row) =>
    row.map((value, columnIndex) => convertTextCell(value, types[columnIndex])),
  );

  return { schema, rows, delimiter: parsed.delimiter };
}

function readWorkbook(data: Uint8Array, options: XLSX.ParsingOptions): XLSX.WorkBook {
  return XLSX.read(data, { ...options, type: 'array' });
}

/**
 * Lists the sheet names of a workbook without parsing cell data.
 */
export function listSpreadsheetSheets(data: Uint8Array): string[] {
  return readWorkbook(data, SHEET_NAMES_ONLY_OPTIONS).SheetNames;
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint' ||
    value instanceof Date
  ) {
    return value;
  }
  return String(value);
}

/**
 * One sheet of a workbook. The first row holds the column names, cell
 * values keep the types the workbook stores (numbers, booleans, dates).
 */
export function loadSpreadsheetTable(data: Uint8Array, sheetName: string): MaterializedTable {
  const workbook = readWorkbook(data, SHEET_DATA_OPTIONS);
  const sheet = workbook.Sheets[sheetName];

  if (!sheet) {
    throw new SourceUnavailableError(`Sheet "${sheetName}" not found`, { operation: 'open' });
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  if (matrix.length === 0) {
    throw new SourceUnavailableError(`Sheet "${sheetName}" is empty`, { operation: 'open' });
  }

  const [headerRow, ...bodyRows] = matrix;
  const width = bodyRows.reduce((max, row) => Math.max(max, row.length), headerRow.length);
  const header = Array.from({ length: width }, (_, index) =>
    toDisplayText(toCellValue(headerRow[index])),
  );
  const rows = bodyRows.map((row) =>
    Array.from({ length: width }, (_, index) => toCellValue(row[index])),
  );

  const schema = buildSchema(
    header,
    header.map((_, columnIndex) => {
      const type = inferValueColumnType(rows.map((row) => row[columnIndex]));
      return { declaredType: type, type };
    }),
  );

  return { schema, rows };
}
