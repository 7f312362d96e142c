import { CellValue, ParsedTable, RawTable, SensorDefinition } from '../types';
import { FileParseError } from '../utils/errors';
import { isNumericCell } from '../utils/normalizer';

/**
 * Splits raw records into header and rows. A first line made only of
 * numbers is data, which is allowed when the stream's known layout has the
 * same width; its column names are used then.
 */
export function resolveHeader(
  raw: RawTable,
  definition: SensorDefinition | null
): ParsedTable {
  const [first, ...rest] = raw.records;
  if (!first || first.length === 0) {
    throw new FileParseError('File has no records');
  }

  const headerless = first.every(isNumericCell);
  let columns: string[];
  let rows: CellValue[][];

  if (headerless) {
    if (!definition || definition.columns.length !== first.length) {
      throw new FileParseError(
        `File has no header row and its ${first.length} fields match no known layout`
      );
    }
    columns = [...definition.columns];
    rows = raw.records;
  } else {
    columns = first.map((cell) => (cell === null ? '' : String(cell)));
    rows = rest;
  }

  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new FileParseError(
        `Row ${index + 1} has ${row.length} fields, expected ${columns.length}`
      );
    }
  });

  return { columns, rows, hasHeader: !headerless };
}
