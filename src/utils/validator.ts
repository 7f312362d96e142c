import { findDuplicateColumns } from '../helpers/dedupeHelper';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export interface PaginationConstraints {
  defaultPageSize: number;
  maxPageSize: number;
}

export interface PaginationResult extends ValidationResult {
  page: number;
  pageSize: number;
}

export const DEFAULT_PAGINATION: PaginationConstraints = {
  defaultPageSize: 100,
  maxPageSize: 1000,
};

const TABLE_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;
const MAX_TABLE_NAME_LENGTH = 64;

/**
 * Validates a table name derived from a file stem
 */
export function validateTableName(name: string): ValidationResult {
  const errors: string[] = [];

  if (!TABLE_NAME_PATTERN.test(name)) {
    errors.push(
      `Table name "${name}" must start with a letter and contain only lower-case letters, digits and underscores`
    );
  }
  if (name.length > MAX_TABLE_NAME_LENGTH) {
    errors.push(`Table name "${name}" exceeds ${MAX_TABLE_NAME_LENGTH} characters`);
  }
  if (name.startsWith('sqlite_')) {
    errors.push(`Table name "${name}" is reserved by SQLite`);
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}

/**
 * Validates a source header before it becomes table columns
 */
export function validateColumns(
  columns: string[],
  reserved: readonly string[]
): ValidationResult {
  const errors: string[] = [];

  if (columns.length === 0) {
    errors.push('Header has no columns');
  }

  columns.forEach((column, index) => {
    if (column.trim() === '') {
      errors.push(`Column ${index + 1} has an empty name`);
    }
  });

  const reservedLower = new Set(reserved.map((name) => name.toLowerCase()));
  for (const column of columns) {
    if (reservedLower.has(column.toLowerCase())) {
      errors.push(`Column "${column}" collides with a catalog column`);
    }
  }

  for (const duplicate of findDuplicateColumns(columns)) {
    errors.push(`Column "${duplicate}" appears more than once`);
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}

/**
 * Validates page and pageSize query values (1-based pages)
 */
export function validatePagination(
  page: string | undefined,
  pageSize: string | undefined,
  constraints: PaginationConstraints = DEFAULT_PAGINATION
): PaginationResult {
  const errors: string[] = [];

  const parsedPage = parsePositiveInteger(page, 1);
  if (parsedPage === null) {
    errors.push('page must be a positive integer');
  }

  const parsedSize = parsePositiveInteger(pageSize, constraints.defaultPageSize);
  if (parsedSize === null) {
    errors.push('pageSize must be a positive integer');
  } else if (parsedSize > constraints.maxPageSize) {
    errors.push(`pageSize exceeds maximum: ${parsedSize} (max: ${constraints.maxPageSize})`);
  }

  return {
    isValid: errors.length === 0,
    errors,
    page: parsedPage ?? 1,
    pageSize: parsedSize ?? constraints.defaultPageSize,
  };
}

/**
 * Parses a positive integer, falling back when the value is absent
 */
export function parsePositiveInteger(
  value: string | undefined,
  fallback: number
): number | null {
  if (value === undefined || value === '') {
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return parsed >= 1 && Number.isSafeInteger(parsed) ? parsed : null;
}
