import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import { CellValue, RawTable } from '../types';
import { normalizeCell } from '../utils/normalizer';
import { TabularReader } from './types';

export type Delimiter = ',' | '\t' | 'whitespace';

/**
 * Picks the delimiter of a text export from its first line: tab, then
 * comma, then runs of whitespace
 */
export function detectDelimiter(line: string): Delimiter {
  if (line.includes('\t')) return '\t';
  if (line.includes(',')) return ',';
  return 'whitespace';
}

/**
 * Splits one line. Double quotes group a field and "" inside quotes is a
 * literal quote. In whitespace mode consecutive blanks separate one field.
 */
export function parseDelimitedLine(line: string, delimiter: Delimiter): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let pendingField = delimiter !== 'whitespace';

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      pendingField = true;
    } else if (delimiter === 'whitespace' && (ch === ' ' || ch === '\t')) {
      if (pendingField) {
        fields.push(current);
        current = '';
        pendingField = false;
      }
    } else if (ch === delimiter) {
      fields.push(current);
      current = '';
    } else {
      current += ch;
      pendingField = true;
    }
  }

  if (pendingField || delimiter !== 'whitespace') {
    fields.push(current);
  }
  return fields;
}

/**
 * Reads every non-blank line of a delimited file. With no delimiter given it
 * is detected from the first line.
 */
export async function readDelimited(
  filePath: string,
  delimiter?: Delimiter
): Promise<RawTable> {
  const rl = createInterface({
    input: createReadStream(filePath, 'utf-8'),
    crlfDelay: Infinity,
  });

  const records: CellValue[][] = [];
  let active = delimiter;

  for await (const rawLine of rl) {
    // BOM written by spreadsheet exports
    const line = records.length === 0 ? rawLine.replace(/^\uFEFF/, '') : rawLine;
    if (line.trim() === '') continue;

    if (!active) {
      active = detectDelimiter(line);
    }
    records.push(parseDelimitedLine(line, active).map(normalizeCell));
  }

  return { records };
}

export const csvReader: TabularReader = {
  format: 'csv',
  extensions: ['.csv'],
  read: (filePath) => readDelimited(filePath, ','),
};

export const textReader: TabularReader = {
  format: 'text',
  extensions: ['.txt', '.tsv'],
  read: (filePath) => readDelimited(filePath),
};
