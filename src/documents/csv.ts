/**
 * CSV Reader
 *
 * RFC 4180 parsing for review exports: quoted fields, doubled quotes,
 * newlines inside quotes, CRLF line endings and a leading BOM.
 */

import { readFile } from 'node:fs/promises';
import { FileNotFoundError, MalformedRecordError } from '../errors/types.js';

export interface CsvTable {
  /** Header names, trimmed */
  columns: string[];
  /** One object per data line, keyed by header name */
  rows: Array<Record<string, string>>;
}

/**
 * Split CSV text into records of raw fields.
 */
function tokenize(text: string): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let quoteLine = 0;
  let line = 1;

  for (let i = 0; i < input.length; i++) {
    const ch = input.charAt(i);

    if (inQuotes) {
      if (ch === '"') {
        if (input.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
      quoteLine = line;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && input.charAt(i + 1) === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      line++;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new MalformedRecordError(`Unterminated quoted field starting on line ${quoteLine}`);
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines
  return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse CSV text with a header line.
 *
 * Short lines leave the missing columns empty; fields beyond the header are
 * ignored.
 *
 * @throws MalformedRecordError on an unterminated quote or a missing header
 */
export function parseCsv(text: string): CsvTable {
  const [header, ...body] = tokenize(text);
  const columns = header?.map((name) => name.trim()) ?? [];

  if (columns.every((name) => name === '')) {
    throw new MalformedRecordError('CSV input has no header row');
  }

  const rows = body.map((fields) => {
    const row: Record<string, string> = {};
    columns.forEach((name, i) => {
      row[name] = fields[i] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Read and parse a review CSV file.
 *
 * @throws FileNotFoundError if the file does not exist
 */
export async function readReviewCsv(path: string): Promise<CsvTable> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FileNotFoundError(path);
    }
    throw error;
  }
  return parseCsv(text);
}
