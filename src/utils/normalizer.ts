import path from 'path';
import { CellValue } from '../types';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isNumericText(text: string): boolean {
  return NUMERIC_PATTERN.test(text.trim());
}

/**
 * Normalizes a delimited-text cell: surrounding whitespace is dropped and an
 * empty cell becomes null. Numeric text becomes a number only when the number
 * prints back as the same text, so `007`, `1.50` and integers past 2^53 are
 * kept as written.
 */
export function normalizeCell(raw: string): CellValue {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }
  if (NUMERIC_PATTERN.test(trimmed)) {
    const value = Number(trimmed);
    if (Number.isFinite(value) && String(value) === trimmed) {
      return value;
    }
  }
  return trimmed;
}

/**
 * A cell that holds a number, either converted or kept as numeric text
 */
export function isNumericCell(cell: CellValue): boolean {
  if (typeof cell === 'number') return true;
  return typeof cell === 'string' && isNumericText(cell);
}

/**
 * Destination table of a stream: the file stem in lower case
 */
export function toTableName(stem: string): string {
  return stem.trim().toLowerCase();
}

export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

export function splitFileName(name: string): { stem: string; extension: string } {
  const extension = path.extname(name);
  return {
    stem: extension ? name.slice(0, -extension.length) : name,
    extension: extension.toLowerCase(),
  };
}
