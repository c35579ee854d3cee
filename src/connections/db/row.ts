import type { QueryResultRow } from 'pg';

// Column readers for pg rows: SERIAL comes back as number, BIGINT and
// DECIMAL as strings, TIMESTAMP as Date

export const readNumber = (row: QueryResultRow, column: string): number => {
  const value = Number(row[column]);
  if (!Number.isFinite(value)) {
    throw new TypeError(`Column ${column} is not numeric`);
  }
  return value;
};

export const readNullableNumber = (row: QueryResultRow, column: string): number | null =>
  row[column] === null || row[column] === undefined ? null : readNumber(row, column);

export const readString = (row: QueryResultRow, column: string): string => String(row[column]);

export const readNullableString = (row: QueryResultRow, column: string): string | null =>
  row[column] === null || row[column] === undefined ? null : String(row[column]);

export const readBoolean = (row: QueryResultRow, column: string): boolean => row[column] === true;

export const readDate = (row: QueryResultRow, column: string): Date => {
  const value: unknown = row[column];
  return value instanceof Date ? value : new Date(String(value));
};

export const readEnum = <T extends string>(
  row: QueryResultRow,
  column: string,
  guard: (value: unknown) => value is T
): T => {
  const value: unknown = row[column];
  if (!guard(value)) {
    throw new TypeError(`Unexpected value in column ${column}: ${String(value)}`);
  }
  return value;
};

export const readNullableEnum = <T extends string>(
  row: QueryResultRow,
  column: string,
  guard: (value: unknown) => value is T
): T | null => (row[column] === null || row[column] === undefined ? null : readEnum(row, column, guard));
