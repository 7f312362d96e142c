import { CellValue as WorkbookValue, Workbook } from 'exceljs';
import { CellValue, RawTable } from '../types';
import { normalizeCell } from '../utils/normalizer';
import { TabularReader } from './types';

type FormulaResult = number | string | boolean | Date | { error: unknown } | undefined;

function normalizeScalar(value: number | string | boolean | Date): CellValue {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return normalizeCell(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value.toISOString();
}

function normalizeFormulaResult(result: FormulaResult): CellValue {
  if (result === undefined) return null;
  if (result instanceof Date) return result.toISOString();
  if (typeof result === 'object') return null;
  return normalizeScalar(result);
}

/**
 * Maps a spreadsheet cell onto the values the catalog stores. Rich text and
 * hyperlinks keep their text, formulas their cached result, dates become ISO
 * strings and error cells become null.
 */
export function normalizeWorkbookValue(value: WorkbookValue): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return normalizeScalar(value);
  }
  if ('richText' in value) {
    return normalizeCell(value.richText.map((part) => part.text).join(''));
  }
  if ('hyperlink' in value) {
    return normalizeCell(value.text);
  }
  if ('error' in value) {
    return null;
  }
  return normalizeFormulaResult(value.result);
}

/**
 * Reads the first worksheet. Spreadsheets drop trailing empty cells, so
 * shorter rows are padded to the width of the first row.
 */
export async function readWorkbook(filePath: string): Promise<RawTable> {
  const workbook = new Workbook();
  await workbook.xlsx.readFile(filePath);

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    return { records: [] };
  }

  const records: CellValue[][] = [];
  sheet.eachRow({ includeEmpty: false }, (row) => {
    const cells: CellValue[] = [];
    for (let column = 1; column <= row.cellCount; column++) {
      cells.push(normalizeWorkbookValue(row.getCell(column).value));
    }
    records.push(cells);
  });

  const width = records[0]?.length ?? 0;
  for (const record of records) {
    while (record.length < width) {
      record.push(null);
    }
  }

  return { records };
}

export const workbookReader: TabularReader = {
  format: 'xlsx',
  extensions: ['.xlsx'],
  read: readWorkbook,
};
