import { SOURCE } from '../config/constants';

export interface DelimitedText {
  header: string[];
  rows: string[][];
  delimiter: string;
}

const QUOTE = '"';
const BOM = '\uFEFF';

const isLineBreak = (ch: string): boolean => ch === '\n' || ch === '\r';

/**
 * Splits delimited text into records of cells in one pass.
 *
 * A double quote at the start of a cell opens a quoted cell, which may hold
 * delimiters and line breaks; a doubled quote inside it is a literal quote.
 * Outside quotes `\n`, `\r\n` and `\r` end a record. A trailing delimiter
 * yields a trailing empty cell, a final line break no extra record.
 */
export function parseDelimitedRecords(text: string, delimiter: string = ','): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = 0;

  const endCell = (): void => {
    record.push(cell);
    cell = '';
  };
  const endRecord = (): void => {
    endCell();
    records.push(record);
    record = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === QUOTE && text[i + 1] === QUOTE) {
        cell += QUOTE;
        i += 2;
        continue;
      }
      if (ch === QUOTE) {
        inQuotes = false;
      } else {
        cell += ch;
      }
      i += 1;
      continue;
    }

    if (ch === QUOTE && cell === '') {
      inQuotes = true;
      i += 1;
    } else if (text.startsWith(delimiter, i)) {
      endCell();
      i += delimiter.length;
    } else if (isLineBreak(ch)) {
      endRecord();
      i += ch === '\r' && text[i + 1] === '\n' ? 2 : 1;
    } else {
      cell += ch;
      i += 1;
    }
  }

  if (cell !== '' || record.length > 0 || inQuotes) {
    endRecord();
  }

  return records;
}

/**
 * Counts a delimiter outside quotes up to the end of the first record.
 */
function countInFirstRecord(text: string, delimiter: string): number {
  let count = 0;
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === QUOTE) {
      inQuotes = !inQuotes;
    } else if (!inQuotes && isLineBreak(ch)) {
      break;
    } else if (!inQuotes && text.startsWith(delimiter, i)) {
      count += 1;
    }
  }

  return count;
}

/**
 * Picks the candidate delimiter occurring most often outside quotes in the
 * header record. Ties go to the earlier candidate, no occurrence at all to `,`.
 */
export function detectDelimiter(
  text: string,
  candidates: readonly string[] = SOURCE.DELIMITER_CANDIDATES,
): string {
  let best = ',';
  let bestCount = 0;

  for (const candidate of candidates) {
    const count = countInFirstRecord(text, candidate);
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }

  return best;
}

const isBlankRecord = (record: readonly string[]): boolean =>
  record.length === 1 && record[0].trim() === '';

/**
 * Parses a delimited text file with a header record. Blank lines are
 * skipped, short rows are padded with empty cells and long rows are cut
 * to the header width.
 */
export function parseDelimitedText(text: string, delimiter?: string): DelimitedText {
  const body = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  const resolvedDelimiter = delimiter ?? detectDelimiter(body);
  const records = parseDelimitedRecords(body, resolvedDelimiter).filter(
    (record) => !isBlankRecord(record),
  );

  if (records.length === 0) {
    return { header: [], rows: [], delimiter: resolvedDelimiter };
  }

  const [headerRecord, ...bodyRecords] = records;
  const header = headerRecord.map((name) => name.trim());
  const width = header.length;

  const rows = bodyRecords.map((cells) => {
    if (cells.length >= width) {
      return cells.slice(0, width);
    }
    return [...cells, ...new Array<string>(width - cells.length).fill('')];
  });

  return { header, rows, delimiter: resolvedDelimiter };
}
