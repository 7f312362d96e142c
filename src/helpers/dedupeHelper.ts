/**
 * SQLite compares column names case-insensitively, so every check here does too.
 */

/**
 * Returns each column name that appears more than once, as first written
 */
export function findDuplicateColumns(columns: string[]): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];

  for (const column of columns) {
    const key = column.toLowerCase();
    if (seen.has(key) && !duplicates.some((d) => d.toLowerCase() === key)) {
      duplicates.push(column);
    }
    seen.add(key);
  }

  return duplicates;
}

/**
 * Columns of an incoming file that the existing table does not have yet,
 * in file order
 */
export function missingColumns(existing: string[], incoming: string[]): string[] {
  const known = new Set(existing.map((c) => c.toLowerCase()));
  return incoming.filter((column) => !known.has(column.toLowerCase()));
}
